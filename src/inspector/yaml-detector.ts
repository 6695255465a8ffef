/**
 * Static-analysis detection for YAML pipeline definitions.
 *
 * A YAML file that never mentions the tool counts as `enabled` with
 * the `no_checkmarx` detail, unlike classic pipelines where a missing
 * task is `not-applicable`.
 */

import { parse } from 'yaml';
import { DetailCode, StaticAnalysis } from '../types/index.js';
import type { StaticAnalysisResult } from './types.js';

export interface YamlStaticAnalysisDetector {
  readonly kind: YamlDetectorKind;
  detect(content: string): StaticAnalysisResult;
}

export type YamlDetectorKind = 'heuristic' | 'structured';

/** Lines inspected on each side of a tool mention */
export const HEURISTIC_WINDOW = 5;

const DISABLE_MARKER = /condition.*false|enabled.*false/i;

function titleCase(name: string): string {
  return name.charAt(0).toUpperCase() + name.slice(1);
}

function noTool(): StaticAnalysisResult {
  return { staticAnalysis: StaticAnalysis.ENABLED, staticAnalysisDetail: DetailCode.NO_TOOL };
}

/**
 * Line-window grep around every mention of the tool.
 */
export class HeuristicYamlDetector implements YamlStaticAnalysisDetector {
  readonly kind = 'heuristic';

  constructor(private readonly toolName: string) {}

  detect(content: string): StaticAnalysisResult {
    const tool = this.toolName.toLowerCase();
    const lines = content.split(/\r?\n/);

    const mentions: number[] = [];
    lines.forEach((line, index) => {
      if (line.toLowerCase().includes(tool)) {
        mentions.push(index);
      }
    });

    if (mentions.length === 0) {
      return noTool();
    }

    const disabled = mentions.some((index) => {
      const window = lines.slice(Math.max(0, index - HEURISTIC_WINDOW), index + HEURISTIC_WINDOW + 1);
      return window.some((line) => DISABLE_MARKER.test(line));
    });

    if (disabled) {
      return {
        staticAnalysis: StaticAnalysis.DISABLED,
        staticAnalysisDetail: `YAML - some ${titleCase(this.toolName)} tasks disabled`,
      };
    }

    return { staticAnalysis: StaticAnalysis.ENABLED, staticAnalysisDetail: DetailCode.NONE };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFalse(value: unknown): boolean {
  if (value === false) {
    return true;
  }
  return typeof value === 'string' && value.trim().toLowerCase() === 'false';
}

/**
 * Parses the document and checks every step that references the tool
 * through `task` or `template`.
 */
export class StructuredYamlDetector implements YamlStaticAnalysisDetector {
  readonly kind = 'structured';

  constructor(private readonly toolName: string) {}

  detect(content: string): StaticAnalysisResult {
    let document: unknown;
    try {
      document = parse(content);
    } catch {
      return { staticAnalysis: StaticAnalysis.ERROR, staticAnalysisDetail: DetailCode.YAML_DECODE_ERROR };
    }

    const steps: Record<string, unknown>[] = [];
    this.collect(document, steps);

    if (steps.length === 0) {
      return noTool();
    }

    const disabled = steps.filter((step) => isFalse(step['enabled']) || isFalse(step['condition']));
    if (disabled.length > 0) {
      return {
        staticAnalysis: StaticAnalysis.DISABLED,
        staticAnalysisDetail: disabled.map((step) => this.describe(step)).join('; '),
      };
    }

    return { staticAnalysis: StaticAnalysis.ENABLED, staticAnalysisDetail: DetailCode.NONE };
  }

  private references(value: unknown): boolean {
    return typeof value === 'string' && value.toLowerCase().includes(this.toolName.toLowerCase());
  }

  private collect(node: unknown, steps: Record<string, unknown>[]): void {
    if (Array.isArray(node)) {
      for (const item of node) {
        this.collect(item, steps);
      }
      return;
    }
    if (!isRecord(node)) {
      return;
    }

    if (this.references(node['task']) || this.references(node['template'])) {
      steps.push(node);
    }
    for (const value of Object.values(node)) {
      this.collect(value, steps);
    }
  }

  private describe(step: Record<string, unknown>): string {
    for (const key of ['displayName', 'task', 'template']) {
      const value = step[key];
      if (typeof value === 'string' && value !== '') {
        return value;
      }
    }
    return titleCase(this.toolName);
  }
}

export function createYamlDetector(kind: YamlDetectorKind, toolName: string): YamlStaticAnalysisDetector {
  return kind === 'structured' ? new StructuredYamlDetector(toolName) : new HeuristicYamlDetector(toolName);
}
