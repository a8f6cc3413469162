import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ToolName } from '../../src/utils/constants.js';
import {
  BraintreeMockFactory,
  SANDBOX_URL,
  createFetchMock,
  sentBody,
} from '../utils/braintree-mocks.js';
import { createInMemoryClient, type MCPTestClient } from '../utils/mcp-test-helpers.js';

const SEARCH_QUERY = `
  query SearchTransactions($input: TransactionSearchInput!, $first: Int!) {
    search { transactions(input: $input, first: $first) { edges { node { id status } } } }
  }
`;

describe('braintree_execute_graphql', () => {
  let fetchMock: ReturnType<typeof createFetchMock>;
  let mcp: MCPTestClient;

  beforeEach(async () => {
    fetchMock = createFetchMock();
    mcp = await createInMemoryClient(fetchMock);
  });

  afterEach(async () => {
    await mcp.close();
  });

  it('should forward query and variables unmodified', async () => {
    const variables = {
      input: { createdAt: { greaterThanOrEqualTo: '2025-01-01T00:00:00Z' } },
      first: 50,
    };
    fetchMock.mockResolvedValueOnce(BraintreeMockFactory.json({ data: { search: { transactions: { edges: [] } } } }));

    await mcp.call(ToolName.EXECUTE_GRAPHQL, { query: SEARCH_QUERY, variables });

    expect(fetchMock.mock.calls[0][0]).toBe(SANDBOX_URL);
    expect(sentBody(fetchMock)).toEqual({ query: SEARCH_QUERY, variables });
  });

  it('should not add variables the caller left out', async () => {
    fetchMock.mockResolvedValueOnce(BraintreeMockFactory.json({ data: { viewer: null } }));

    await mcp.call(ToolName.EXECUTE_GRAPHQL, { query: '{ viewer { id } }' });

    expect(sentBody(fetchMock)).toEqual({ query: '{ viewer { id } }' });
  });

  it('should return the upstream JSON body unmodified', async () => {
    const upstream = {
      data: {
        search: {
          transactions: {
            edges: [
              { node: { id: 'dHJhbnNhY3Rpb25fYWJj', status: 'SETTLED' } },
              { node: { id: 'dHJhbnNhY3Rpb25fZGVm', status: 'VOIDED' } },
            ],
          },
        },
      },
      extensions: { requestId: 'req-search-1' },
    };
    fetchMock.mockResolvedValueOnce(BraintreeMockFactory.json(upstream));

    const output = await mcp.call(ToolName.EXECUTE_GRAPHQL, {
      query: SEARCH_QUERY,
      variables: { input: {}, first: 2 },
    });

    expect(output.isError).toBe(false);
    expect(JSON.parse(output.text)).toEqual(upstream);
  });

  it('should pass GraphQL errors through without flagging the call', async () => {
    const upstream = {
      errors: [{ message: "Cannot query field 'nope' on type 'Query'.", locations: [{ line: 1, column: 3 }] }],
      extensions: { requestId: 'req-err-2' },
    };
    fetchMock.mockResolvedValueOnce(BraintreeMockFactory.json(upstream));

    const output = await mcp.call(ToolName.EXECUTE_GRAPHQL, { query: '{ nope }' });

    expect(output).toEqual({ text: JSON.stringify(upstream), isError: false });
  });

  it('should return the JSON body text byte for byte', async () => {
    const raw = '{ "data" : {"n":12345678901234567890,"amount":10.50,"z":-0,"b":1,"a":2} }\n';
    fetchMock.mockResolvedValueOnce(
      BraintreeMockFactory.text(raw, { headers: { 'content-type': 'application/json' } })
    );

    const output = await mcp.call(ToolName.EXECUTE_GRAPHQL, { query: '{ viewer { id } }' });

    expect(output).toEqual({ text: raw, isError: false });
  });

  it('should return raw text when the upstream body is not JSON', async () => {
    fetchMock.mockResolvedValueOnce(BraintreeMockFactory.text('<html><body>Bad Gateway</body></html>'));

    const output = await mcp.call(ToolName.EXECUTE_GRAPHQL, { query: '{ viewer { id } }' });

    expect(output).toEqual({ text: '<html><body>Bad Gateway</body></html>', isError: false });
  });

  it('should report a non-2xx status as a failure', async () => {
    fetchMock.mockResolvedValueOnce(
      BraintreeMockFactory.text('Service Unavailable', { status: 503, statusText: 'Service Unavailable' })
    );

    const output = await mcp.call(ToolName.EXECUTE_GRAPHQL, { query: '{ viewer { id } }' });

    expect(output).toEqual({ text: 'Error executing GraphQL: HTTP 503 Service Unavailable', isError: true });
  });

  it('should include the upstream error message of a non-2xx JSON body', async () => {
    fetchMock.mockResolvedValueOnce(
      BraintreeMockFactory.json(
        { errors: [{ message: 'Authentication failed' }] },
        { status: 401, statusText: 'Unauthorized' }
      )
    );

    const output = await mcp.call(ToolName.EXECUTE_GRAPHQL, { query: '{ viewer { id } }' });

    expect(output).toEqual({
      text: 'Error executing GraphQL: HTTP 401 Unauthorized - Authentication failed',
      isError: true,
    });
  });

  it('should report a refused connection as a failure', async () => {
    fetchMock.mockRejectedValueOnce(BraintreeMockFactory.connectionRefused());

    const output = await mcp.call(ToolName.EXECUTE_GRAPHQL, { query: '{ viewer { id } }' });

    expect(output).toEqual({
      text: 'Error executing GraphQL: fetch failed (connect ECONNREFUSED 127.0.0.1:443)',
      isError: true,
    });
  });

  it('should report a timeout as a failure and not retry', async () => {
    fetchMock.mockRejectedValueOnce(
      Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' })
    );

    const output = await mcp.call(ToolName.EXECUTE_GRAPHQL, { query: '{ viewer { id } }' });

    expect(output).toEqual({ text: 'Error executing GraphQL: request timed out after 30000ms', isError: true });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should keep serving after a failure', async () => {
    fetchMock
      .mockRejectedValueOnce(BraintreeMockFactory.connectionRefused())
      .mockResolvedValueOnce(BraintreeMockFactory.json({ data: { viewer: { id: 'user-1' } } }));

    const first = await mcp.call(ToolName.EXECUTE_GRAPHQL, { query: '{ viewer { id } }' });
    const second = await mcp.call(ToolName.EXECUTE_GRAPHQL, { query: '{ viewer { id } }' });

    expect(first.isError).toBe(true);
    expect(second).toEqual({ text: '{"data":{"viewer":{"id":"user-1"}}}', isError: false });
  });
});
