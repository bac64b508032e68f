import { fileURLToPath } from 'node:url';

/**
 * Path of the newline-delimited JSON-RPC MCP server used by the stdio tests.
 * Run it with `process.execPath`; the first argument selects its behaviour.
 */
export const FAKE_SERVER_PATH = fileURLToPath(
  new URL('../fixtures/fake-mcp-server.mjs', import.meta.url)
);
