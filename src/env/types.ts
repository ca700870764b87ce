/**
 * Configuration types for railway-preflight
 */

/**
 * An environment variable the deployment target must define.
 * Listed for the operator only; never read from the local environment.
 */
export interface RequiredEnvVar {
  name: string;
  description: string;
}

/**
 * Shape of `.railway-preflight.json`
 */
export interface ProjectConfigFile {
  cliCommand?: string;
  requiredFiles?: string[];
  envVars?: RequiredEnvVar[];
  secretVariable?: string;
  debug?: boolean;
}

export interface PreflightConfig {
  workingDir: string;
  cliCommand: string;          // Railway CLI executable
  requiredFiles: string[];     // Checked in order, relative to workingDir
  envVars: RequiredEnvVar[];
  secretVariable?: string;     // Variable named in the secret-generation hint
  debug: boolean;
}

/**
 * Overrides accepted from the command line
 */
export interface CliOverrides {
  cliCommand?: string;
  debug?: boolean;
}
