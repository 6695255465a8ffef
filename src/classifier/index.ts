export { classify, describeReason, isInconclusive } from './compliance-classifier.js';
