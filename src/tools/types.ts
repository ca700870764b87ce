/**
 * Deployment CLI tool types
 */

/**
 * Subcommands the menu can dispatch to
 */
export type DeploySubcommand = 'init' | 'link' | 'up';

export interface ToolInfo {
  name: string;
  displayName: string;
  command: string;
  npmPackage: string;
  versionArgs: string[];
  authCheckArgs: string[];
  authArgs: string[];
  subcommands: Record<DeploySubcommand, string[]>;
  docsUrl: string;
}

export interface AuthStatus {
  authenticated: boolean;
  user: string | null;
}

/**
 * Black-box client for the deployment CLI.
 * Exit codes are returned as-is; output is never parsed beyond whoami/version.
 */
export interface DeployToolClient {
  readonly info: ToolInfo;
  locate(): Promise<string | null>;
  getVersion(): Promise<string | null>;
  checkAuthentication(): Promise<AuthStatus>;
  login(): Promise<number>;
  run(subcommand: DeploySubcommand): Promise<number>;
}
