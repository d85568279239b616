// pattern: Imperative Shell

import { describe, it, expect } from 'vitest';
import { AppConfigSchema } from '../../config/schema.ts';
import { decodeDense, encodeDense, encodeJson } from '../../encoding/index.ts';
import { createDefaultProviders } from '../../providers/factory.ts';
import { createProviderRegistry } from '../../providers/registry.ts';
import { createUpstreamClient } from '../../upstream/client.ts';
import { TEST_HTTP_CONFIG, createFakeFetch, jsonResponse } from '../../upstream/test-helpers.ts';
import { createToolRegistry } from '../registry.ts';
import { createProviderTools } from './providers.ts';

const CONFIG = AppConfigSchema.parse({
  pypi: { base_url: 'https://pypi.test' },
  github: { api_base: 'https://api.github.test' },
});

function setup(handler: (url: URL) => Response, encode = encodeJson) {
  const fakeFetch = createFakeFetch(handler);
  const registry = createProviderRegistry(
    createDefaultProviders(CONFIG, createUpstreamClient(TEST_HTTP_CONFIG, fakeFetch)),
  );
  const tools = createToolRegistry();
  for (const tool of createProviderTools({ registry, encode })) {
    tools.register(tool);
  }
  return { fakeFetch, tools };
}

describe('createProviderTools', () => {
  it('should register one tool per provider operation', () => {
    const { tools } = setup(() => jsonResponse({}));

    expect(tools.getDefinitions().map((d) => d.name)).toEqual([
      'pypi_metadata',
      'github_repo_search',
      'github_code_search',
      'google_search',
      'godocs_search',
    ]);
  });

  it('should encode a successful result', async () => {
    const { tools } = setup(() =>
      jsonResponse({ info: { name: 'httpx', version: '0.27.0', summary: 'The next generation HTTP client.' } }),
    );

    const result = await tools.dispatch('pypi_metadata', { package: 'httpx' });

    expect(result.success).toBe(true);
    expect(JSON.parse(result.output)).toEqual({
      name: 'httpx',
      version: '0.27.0',
      summary: 'The next generation HTTP client.',
      home_page: null,
      docs_url: null,
      project_urls: {},
      requires_python: null,
    });
  });

  it('should use the dense encoding when configured', async () => {
    const { tools } = setup(
      () =>
        jsonResponse({
          items: [
            { name: 'api.py', path: 'httpx/api.py', html_url: 'https://github.test/a', repository: { full_name: 'encode/httpx' } },
          ],
        }),
      encodeDense,
    );

    const result = await tools.dispatch('github_code_search', { query: 'def get', repo: 'encode/httpx', limit: 1 });

    expect(result.success).toBe(true);
    expect(result.output.split('\n')[0]).toBe('[1]{name,path,repository,url}:');
    expect(decodeDense(result.output)).toEqual([
      { name: 'api.py', path: 'httpx/api.py', repository: 'encode/httpx', url: 'https://github.test/a' },
    ]);
  });

  it('should report invalid input without calling upstream', async () => {
    const { tools, fakeFetch } = setup(() => jsonResponse({ items: [] }));

    const result = await tools.dispatch('github_repo_search', { query: 'httpx', limit: 500 });

    expect(result).toEqual({
      success: false,
      output: '',
      error: 'invalid input: limit: must be between 1 and 100',
    });
    expect(fakeFetch.calls).toHaveLength(0);
  });

  it('should report an upstream failure under the provider label', async () => {
    const { tools } = setup(() => new Response('', { status: 404, statusText: 'Not Found' }));

    const result = await tools.dispatch('pypi_metadata', { package: 'no-such-package' });

    expect(result).toEqual({ success: false, output: '', error: 'PyPI returned 404' });
  });
});
