import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';

export type ServerResult = CallToolResult;
