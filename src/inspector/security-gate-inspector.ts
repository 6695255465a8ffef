/**
 * Security Gate Inspector
 *
 * Reads a pipeline's build definition once and derives both its PR
 * trigger state and its static-analysis state. Transport and decode
 * failures degrade to explicit detail codes.
 */

import { createLogger } from '../utils/logger.js';
import {
  DetailCode,
  PrValidation,
  StaticAnalysis,
  type GateInspection,
  type PipelineIdentity,
} from '../types/index.js';
import {
  CLASSIC_PROCESS_TYPE,
  YAML_PROCESS_TYPE,
  type BuildDefinition,
  type PipelineDefinitionApi,
} from '../azure-devops/index.js';
import type { SourceControlApi } from '../github/index.js';
import { analyzeClassicPipeline } from './classic-analyzer.js';
import type { YamlStaticAnalysisDetector } from './yaml-detector.js';
import type { StaticAnalysisResult, StaticAnalysisTool } from './types.js';

const log = createLogger('inspector');

const PULL_REQUEST_TRIGGER = 'pullRequest';
const PULL_REQUEST_EVENT = 'pull_request';

export type InspectorGitHubApi = Pick<SourceControlApi, 'getFileContent' | 'listWebhooks'>;

export interface SecurityGateInspectorDeps {
  definitions: PipelineDefinitionApi;
  github: InspectorGitHubApi;
  yamlDetector: YamlStaticAnalysisDetector;
  tool: StaticAnalysisTool;
}

function staticAnalysisError(detail: string): StaticAnalysisResult {
  return { staticAnalysis: StaticAnalysis.ERROR, staticAnalysisDetail: detail };
}

/**
 * Whether any trigger fires on pull requests.
 */
export function hasPullRequestTrigger(definition: BuildDefinition): boolean {
  return definition.triggers.some((trigger) => trigger.triggerType === PULL_REQUEST_TRIGGER);
}

/**
 * Split `owner/repo` into its parts.
 */
export function splitFullName(fullName: string): { owner: string; repo: string } | null {
  const slash = fullName.indexOf('/');
  if (slash <= 0 || slash === fullName.length - 1) {
    return null;
  }
  return { owner: fullName.slice(0, slash), repo: fullName.slice(slash + 1) };
}

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;
const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Decode GitHub file content. Returns null when the payload is not
 * valid base64, not valid UTF-8, or carries an encoding other than
 * `base64` / `utf-8` (GitHub answers `none` for files over 1 MB).
 */
export function decodeFileContent(content: string, encoding: string): string | null {
  if (encoding === 'utf-8') {
    return content;
  }
  if (encoding !== 'base64') {
    return null;
  }

  const compact = content.replace(/\s/g, '');
  if (!BASE64_PATTERN.test(compact)) {
    return null;
  }
  try {
    return utf8.decode(Buffer.from(compact, 'base64'));
  } catch {
    return null;
  }
}

export class SecurityGateInspector {
  private readonly definitions: PipelineDefinitionApi;
  private readonly github: InspectorGitHubApi;
  private readonly yamlDetector: YamlStaticAnalysisDetector;
  private readonly tool: StaticAnalysisTool;

  constructor(deps: SecurityGateInspectorDeps) {
    this.definitions = deps.definitions;
    this.github = deps.github;
    this.yamlDetector = deps.yamlDetector;
    this.tool = deps.tool;
  }

  /**
   * Inspect a resolved pipeline. `token` is the CI credential of the
   * pipeline's organization, if one is available.
   */
  async inspect(identity: PipelineIdentity, token: string | null): Promise<GateInspection> {
    if (!token) {
      log.debug({ ...identity }, 'No CI token for pipeline organization');
      return { prValidation: PrValidation.NO_TOKEN, ...staticAnalysisError(DetailCode.NO_TOKEN) };
    }

    let definition: BuildDefinition;
    try {
      definition = await this.definitions.getDefinition(identity, token);
    } catch (error) {
      log.warn(
        { ...identity, error: error instanceof Error ? error.message : String(error) },
        'Build definition lookup failed'
      );
      return { prValidation: PrValidation.ERROR, ...staticAnalysisError(DetailCode.API_ERROR) };
    }

    const prValidation = hasPullRequestTrigger(definition) ? PrValidation.ENABLED : PrValidation.DISABLED;
    const staticAnalysis = await this.analyzeStaticAnalysis(definition);

    log.debug(
      { ...identity, prValidation, staticAnalysis: staticAnalysis.staticAnalysis },
      'Pipeline inspected'
    );

    return { prValidation, ...staticAnalysis };
  }

  /**
   * PR validation of a standalone repository: a webhook subscribed to
   * pull_request events.
   */
  async inspectStandalone(organization: string, repository: string): Promise<PrValidation> {
    try {
      const hooks = await this.github.listWebhooks(organization, repository);
      const subscribed = hooks.some((hook) => hook.events.includes(PULL_REQUEST_EVENT));
      return subscribed ? PrValidation.ENABLED : PrValidation.DISABLED;
    } catch (error) {
      log.warn(
        { organization, repository, error: error instanceof Error ? error.message : String(error) },
        'Webhook lookup failed'
      );
      return PrValidation.ERROR;
    }
  }

  private async analyzeStaticAnalysis(definition: BuildDefinition): Promise<StaticAnalysisResult> {
    switch (definition.process?.type) {
      case CLASSIC_PROCESS_TYPE:
        return analyzeClassicPipeline(definition, this.tool);
      case YAML_PROCESS_TYPE:
        return this.analyzeYamlPipeline(definition);
      default:
        return staticAnalysisError(DetailCode.UNKNOWN_PIPELINE_TYPE);
    }
  }

  private async analyzeYamlPipeline(definition: BuildDefinition): Promise<StaticAnalysisResult> {
    const yamlPath = definition.process?.yamlFilename?.replace(/^\/+/, '');
    const fullName = definition.repository?.properties?.fullName;
    const location = fullName ? splitFullName(fullName) : null;

    if (!yamlPath || !location) {
      return staticAnalysisError(DetailCode.YAML_ERROR);
    }

    const ref = (definition.repository?.defaultBranch ?? 'main').replace(/^refs\/heads\//, '');

    let content: string | null;
    try {
      const file = await this.github.getFileContent(location.owner, location.repo, yamlPath, ref);
      content = decodeFileContent(file.content, file.encoding);
    } catch (error) {
      log.warn(
        { ...location, yamlPath, ref, error: error instanceof Error ? error.message : String(error) },
        'Pipeline YAML fetch failed'
      );
      return staticAnalysisError(DetailCode.YAML_FETCH_ERROR);
    }

    if (content === null || content.trim() === '') {
      return staticAnalysisError(DetailCode.YAML_DECODE_ERROR);
    }

    return this.yamlDetector.detect(content);
  }
}
