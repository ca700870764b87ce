/**
 * Deployment tools registry
 */

import type { ToolInfo } from './types.js';

export const RAILWAY: ToolInfo = {
  name: 'railway',
  displayName: 'Railway CLI',
  command: 'railway',
  npmPackage: '@railway/cli',
  versionArgs: ['--version'],
  authCheckArgs: ['whoami'],
  authArgs: ['login'],
  subcommands: {
    init: ['init'],
    link: ['link'],
    up: ['up'],
  },
  docsUrl: 'https://docs.railway.app/develop/cli',
};

/**
 * Railway tool info, optionally pointing at a different executable
 */
export function getToolInfo(command?: string): ToolInfo {
  return command ? { ...RAILWAY, command } : RAILWAY;
}

/**
 * Format a tool invocation for display, always under the tool's public name
 */
export function formatToolCommand(info: ToolInfo, args: string[]): string {
  return [info.name, ...args].join(' ');
}
