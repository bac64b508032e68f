import 'reflect-metadata';
export * from './core';
export * from './services/mcp';
export { CONFIG_DEFAULTS } from './services/core/config.service';
export { normalizeTransport } from './utils/identifiers';
export {
  exposedToolName,
  parseToolArguments,
  renderToolResult,
} from './services/registry/tool-registry.service';
export { ToolRegistry, DEFAULT_TOOL_CACHE_TTL_MS } from './services/registry/tool-registry.service';
export { ServiceDirectory } from './services/directory/service-directory.service';
