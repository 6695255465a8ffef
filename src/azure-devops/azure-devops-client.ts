/**
 * Azure DevOps build-definition client
 */
import { createLogger } from '../utils/logger.js';
import { fetchWithTimeout, RequestTimeoutError } from '../utils/http.js';
import {
  AzureDevOpsError,
  AzureDevOpsErrorCode,
  type PipelineIdentity,
} from '../types/index.js';
import { buildDefinitionSchema, type BuildDefinition } from './schemas.js';

const logger = createLogger('azure-devops:client');

export const AZURE_DEVOPS_API_VERSION = '7.0';

/**
 * CI-system reads used by the audit engine
 */
export interface PipelineDefinitionApi {
  getDefinition(identity: PipelineIdentity, token: string): Promise<BuildDefinition>;
}

export interface AzureDevOpsClientOptions {
  /** Defaults to https://dev.azure.com */
  baseUrl?: string;
  /** Per-request timeout in milliseconds */
  timeoutMs?: number;
  /** Custom fetch implementation */
  fetch?: typeof fetch;
}

export class AzureDevOpsClient implements PipelineDefinitionApi {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(options: AzureDevOpsClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? 'https://dev.azure.com').replace(/\/$/, '');
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.fetchFn = options.fetch ?? fetch;
  }

  /**
   * URL of a build definition
   */
  definitionUrl(identity: PipelineIdentity): string {
    const org = encodeURIComponent(identity.sourceOrg);
    const project = encodeURIComponent(identity.project);
    return `${this.baseUrl}/${org}/${project}/_apis/build/definitions/${identity.numericId}?api-version=${AZURE_DEVOPS_API_VERSION}`;
  }

  /**
   * Fetch a build definition with its triggers, process and repository
   */
  async getDefinition(identity: PipelineIdentity, token: string): Promise<BuildDefinition> {
    const url = this.definitionUrl(identity);
    logger.debug({ ...identity }, 'Fetching build definition');

    let response: Response;
    try {
      response = await fetchWithTimeout(
        url,
        {
          method: 'GET',
          headers: {
            Accept: 'application/json',
            Authorization: `Basic ${Buffer.from(`:${token}`).toString('base64')}`,
          },
        },
        this.timeoutMs,
        this.fetchFn
      );
    } catch (error) {
      if (error instanceof RequestTimeoutError) {
        throw new AzureDevOpsError(error.message, AzureDevOpsErrorCode.TIMEOUT);
      }
      throw new AzureDevOpsError(
        `Request for definition ${identity.numericId} failed: ${error instanceof Error ? error.message : String(error)}`,
        AzureDevOpsErrorCode.NETWORK_ERROR
      );
    }

    if (!response.ok) {
      throw new AzureDevOpsError(
        `Definition ${identity.numericId} in ${identity.sourceOrg}/${identity.project} returned HTTP ${response.status}`,
        AzureDevOpsErrorCode.HTTP_ERROR,
        response.status
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      // An expired token gets an HTML sign-in page with a 203
      throw new AzureDevOpsError(
        `Definition ${identity.numericId} response is not JSON`,
        AzureDevOpsErrorCode.INVALID_RESPONSE,
        response.status
      );
    }

    if (body && typeof body === 'object' && 'message' in body && typeof body.message === 'string') {
      throw new AzureDevOpsError(body.message, AzureDevOpsErrorCode.INVALID_RESPONSE, response.status);
    }

    const parsed = buildDefinitionSchema.safeParse(body);
    if (!parsed.success) {
      throw new AzureDevOpsError(
        `Unexpected definition response: ${parsed.error.message}`,
        AzureDevOpsErrorCode.INVALID_RESPONSE,
        response.status
      );
    }

    return parsed.data;
  }
}
