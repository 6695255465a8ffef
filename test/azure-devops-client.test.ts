/**
 * Azure DevOps Client Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { AzureDevOpsClient } from '../src/azure-devops/index.js';
import { AzureDevOpsError, AzureDevOpsErrorCode, type PipelineIdentity } from '../src/types/index.js';

const identity: PipelineIdentity = { sourceOrg: 'ado-dev', project: 'Payments Team', numericId: 42 };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('AzureDevOpsClient', () => {
  it('should build the definition URL', () => {
    const client = new AzureDevOpsClient({ baseUrl: 'https://ado.example.com/' });

    expect(client.definitionUrl(identity)).toBe(
      'https://ado.example.com/ado-dev/Payments%20Team/_apis/build/definitions/42?api-version=7.0'
    );
  });

  it('should fetch and validate a definition with basic auth', async () => {
    const mockFetch = vi.fn<typeof fetch>().mockResolvedValue(
      jsonResponse({
        id: 42,
        name: 'payments-ci',
        triggers: [{ triggerType: 'pullRequest', branchFilters: ['+main'] }],
        process: { type: 2, yamlFilename: '/azure-pipelines.yml' },
        repository: { type: 'GitHub', defaultBranch: 'refs/heads/main', properties: { fullName: 'acme/payments' } },
      })
    );
    const client = new AzureDevOpsClient({ fetch: mockFetch });

    const definition = await client.getDefinition(identity, 'test-pat');

    expect(definition.id).toBe(42);
    expect(definition.triggers.map((trigger) => trigger.triggerType)).toEqual(['pullRequest']);
    expect(definition.process?.yamlFilename).toBe('/azure-pipelines.yml');
    expect(definition.repository?.properties?.fullName).toBe('acme/payments');

    const [url, init] = mockFetch.mock.calls[0] ?? [];
    expect(url).toBe(
      'https://dev.azure.com/ado-dev/Payments%20Team/_apis/build/definitions/42?api-version=7.0'
    );
    expect(init?.headers).toEqual({
      Accept: 'application/json',
      Authorization: 'Basic OnRlc3QtcGF0',
    });
  });

  it('should default missing triggers to an empty list', async () => {
    const mockFetch = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ id: 42, process: { type: 1 } }));
    const client = new AzureDevOpsClient({ fetch: mockFetch });

    const definition = await client.getDefinition(identity, 'test-pat');

    expect(definition.triggers).toEqual([]);
  });

  it('should map non-2xx responses to HTTP_ERROR', async () => {
    const mockFetch = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({}, 404));
    const client = new AzureDevOpsClient({ fetch: mockFetch });

    await expect(client.getDefinition(identity, 'test-pat')).rejects.toMatchObject({
      code: AzureDevOpsErrorCode.HTTP_ERROR,
      statusCode: 404,
    });
  });

  it('should map non-JSON bodies to INVALID_RESPONSE', async () => {
    const mockFetch = vi
      .fn<typeof fetch>()
      .mockResolvedValue(new Response('<html>Sign in</html>', { status: 203 }));
    const client = new AzureDevOpsClient({ fetch: mockFetch });

    await expect(client.getDefinition(identity, 'test-pat')).rejects.toMatchObject({
      code: AzureDevOpsErrorCode.INVALID_RESPONSE,
    });
  });

  it('should map API error bodies to INVALID_RESPONSE', async () => {
    const mockFetch = vi
      .fn<typeof fetch>()
      .mockResolvedValue(jsonResponse({ message: 'TF401019: definition does not exist' }));
    const client = new AzureDevOpsClient({ fetch: mockFetch });

    await expect(client.getDefinition(identity, 'test-pat')).rejects.toThrow(
      'TF401019: definition does not exist'
    );
  });

  it('should map network failures to NETWORK_ERROR', async () => {
    const mockFetch = vi.fn<typeof fetch>().mockRejectedValue(new TypeError('fetch failed'));
    const client = new AzureDevOpsClient({ fetch: mockFetch });

    const error = await client.getDefinition(identity, 'test-pat').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(AzureDevOpsError);
    expect(error).toMatchObject({ code: AzureDevOpsErrorCode.NETWORK_ERROR });
  });

  it('should map slow responses to TIMEOUT', async () => {
    const mockFetch = vi.fn<typeof fetch>().mockImplementation(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        })
    );
    const client = new AzureDevOpsClient({ fetch: mockFetch, timeoutMs: 10 });

    await expect(client.getDefinition(identity, 'test-pat')).rejects.toMatchObject({
      code: AzureDevOpsErrorCode.TIMEOUT,
    });
  });
});
