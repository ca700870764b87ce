/**
 * End-to-end runs of the deploy workflow against an in-process Railway CLI stand-in
 */

import { describe, it, expect } from 'vitest';
import { runDeployWorkflow } from '../../src/deploy/workflow.js';
import { ConfigLoader } from '../../src/utils/config.js';
import {
  DelegatedFailureError,
  InvalidSelectionError,
  MissingArtifactError,
  MissingDependencyError,
  OperatorDeclinedError,
} from '../../src/utils/errors.js';
import { createFakeDeps } from '../helpers/fake-deps.js';

const config = ConfigLoader.getDefaults('/srv/backend');

describe('runDeployWorkflow', () => {
  describe('tool presence', () => {
    it('should abort before any other check when the Railway CLI is missing', async () => {
      const { deps, tool, prompt, fileExists, lines, spinnerEvents } = createFakeDeps({ path: null });

      await expect(runDeployWorkflow(config, deps)).rejects.toBeInstanceOf(MissingDependencyError);

      expect(tool.checkAuthentication).not.toHaveBeenCalled();
      expect(fileExists).not.toHaveBeenCalled();
      expect(prompt).not.toHaveBeenCalled();
      expect(spinnerEvents).toContain('fail:Railway CLI not found!');
      expect(lines).toContain('  npm install -g @railway/cli');
      expect(lines).toContain('Or visit: https://docs.railway.app/develop/cli');
    });
  });

  describe('authentication', () => {
    it('should not log in when already authenticated', async () => {
      const { deps, tool, spinnerEvents } = createFakeDeps({ answers: ['y', '4'] });

      await runDeployWorkflow(config, deps);

      expect(tool.login).not.toHaveBeenCalled();
      expect(spinnerEvents).toContain('succeed:Already logged in to Railway as Test User');
    });

    it('should delegate to the login flow when the identity query fails', async () => {
      const { deps, tool, lines, spinnerEvents } = createFakeDeps({
        auth: { authenticated: false, user: null },
        answers: ['y', '4'],
      });

      await runDeployWorkflow(config, deps);

      expect(tool.login).toHaveBeenCalledTimes(1);
      expect(spinnerEvents).toContain('warn:Not logged in to Railway');
      expect(lines).toContain('Logging in...');
    });

    it('should continue without re-verifying when login exits non-zero', async () => {
      const { deps, tool } = createFakeDeps({
        auth: { authenticated: false, user: null },
        loginCode: 1,
        answers: ['y', '4'],
      });

      const outcome = await runDeployWorkflow(config, deps);

      expect(outcome).toEqual({ action: 'exit', exitCode: 0 });
      expect(tool.checkAuthentication).toHaveBeenCalledTimes(1);
    });
  });

  describe('required files', () => {
    it('should list every missing file before aborting', async () => {
      const { deps, prompt, lines } = createFakeDeps({ presentFiles: ['requirements.txt', 'Procfile'] });

      await expect(runDeployWorkflow(config, deps)).rejects.toMatchObject({
        name: 'MissingArtifactError',
        missing: ['app.py', 'runtime.txt'],
        exitCode: 1,
      });

      const checklistStart = lines.indexOf('📦 Pre-deployment Checklist');
      expect(lines.slice(checklistStart + 3, checklistStart + 7)).toEqual([
        '✅ requirements.txt',
        '✅ Procfile',
        '❌ app.py - MISSING!',
        '❌ runtime.txt - MISSING!',
      ]);
      expect(lines).toContain('❌ Some required files are missing!');
      expect(prompt).not.toHaveBeenCalled();
    });

    it('should check paths inside the configured working directory', async () => {
      const { deps, fileExists } = createFakeDeps({ answers: ['y', '4'] });

      await runDeployWorkflow(config, deps);

      expect(fileExists).toHaveBeenCalledTimes(4);
      expect(fileExists).toHaveBeenNthCalledWith(1, '/srv/backend/requirements.txt');
      expect(fileExists).toHaveBeenNthCalledWith(4, '/srv/backend/runtime.txt');
    });
  });

  describe('environment readiness gate', () => {
    it('should list the required variables in order', async () => {
      const { deps, lines } = createFakeDeps({ answers: ['y', '4'] });

      await runDeployWorkflow(config, deps);

      const start = lines.indexOf('Make sure you have these ready:');
      expect(lines.slice(start + 1, start + 4)).toEqual([
        '  1. MONGO_URI - Your MongoDB Atlas connection string',
        '  2. JWT_SECRET_KEY - A secure random string',
        "  3. FLASK_ENV - Set to 'production'",
      ]);
    });

    it.each(['y', 'Y'])('should proceed to the menu on %j', async (answer) => {
      const { deps, prompt } = createFakeDeps({ answers: [answer, '4'] });

      const outcome = await runDeployWorkflow(config, deps);

      expect(outcome.action).toBe('exit');
      expect(prompt).toHaveBeenLastCalledWith('Choose an option (1-4):');
    });

    it.each(['', 'yes', 'Y ', 'n', 'N', ' y'])('should abort on %j', async (answer) => {
      const { deps, tool, prompt, lines } = createFakeDeps({ answers: [answer] });

      await expect(runDeployWorkflow(config, deps)).rejects.toBeInstanceOf(OperatorDeclinedError);

      expect(prompt).toHaveBeenCalledTimes(1);
      expect(tool.run).not.toHaveBeenCalled();
      expect(lines).toContain('⚠️  Please prepare your environment variables first.');
      expect(lines).toContain('To generate a secure JWT_SECRET_KEY:');
      expect(lines).toContain('  python -c "import secrets; print(secrets.token_hex(32))"');
    });
  });

  describe('menu dispatch', () => {
    it('should deploy exactly once and print the completion guidance', async () => {
      const { deps, tool, lines } = createFakeDeps({ answers: ['y', '3'] });

      const outcome = await runDeployWorkflow(config, deps);

      expect(outcome).toEqual({ action: 'deploy', exitCode: 0 });
      expect(tool.run).toHaveBeenCalledTimes(1);
      expect(tool.run).toHaveBeenCalledWith('up');
      expect(lines).toContain('✅ Deployment complete!');
      expect(lines).toContain('  railway open');
      expect(lines).toContain('  railway logs');
      expect(lines).toContain('View logs:           railway logs');
      expect(lines).toContain('Run locally:         railway run python app.py');
      expect(lines.at(-2)).toBe('✅ Deployment process complete!');
    });

    it('should initialize a project and print the next steps', async () => {
      const { deps, tool, lines } = createFakeDeps({ answers: ['y', '1'] });

      const outcome = await runDeployWorkflow(config, deps);

      expect(outcome).toEqual({ action: 'init', exitCode: 0 });
      expect(tool.run).toHaveBeenCalledWith('init');
      expect(lines).toContain('✅ Project initialized');
      expect(lines).toContain('  1. Add environment variables: railway variables');
      expect(lines).toContain('  2. Deploy: railway up');
    });

    it('should link an existing project', async () => {
      const { deps, tool, lines } = createFakeDeps({ answers: ['y', '2'] });

      const outcome = await runDeployWorkflow(config, deps);

      expect(outcome).toEqual({ action: 'link', exitCode: 0 });
      expect(tool.run).toHaveBeenCalledWith('link');
      expect(lines).toContain('✅ Project linked');
      expect(lines).toContain('📊 Useful Railway Commands');
    });

    it('should exit cleanly on option 4 without running any subcommand', async () => {
      const { deps, tool, lines } = createFakeDeps({ answers: ['y', '4'] });

      const outcome = await runDeployWorkflow(config, deps);

      expect(outcome).toEqual({ action: 'exit', exitCode: 0 });
      expect(tool.run).not.toHaveBeenCalled();
      expect(lines.at(-1)).toBe('Exiting...');
      expect(lines).not.toContain('📊 Useful Railway Commands');
    });

    it.each(['5', 'abc', '', '03'])('should reject %j as an invalid option', async (input) => {
      const { deps, tool, lines } = createFakeDeps({ answers: ['y', input] });

      await expect(runDeployWorkflow(config, deps)).rejects.toBeInstanceOf(InvalidSelectionError);

      expect(tool.run).not.toHaveBeenCalled();
      expect(lines.at(-1)).toBe('Invalid option');
    });

    it('should pass a failing subcommand exit code through untouched', async () => {
      const { deps, lines } = createFakeDeps({ answers: ['y', '3'], exitCodes: { up: 2 } });

      const run = runDeployWorkflow(config, deps);

      await expect(run).rejects.toBeInstanceOf(DelegatedFailureError);
      await expect(run).rejects.toMatchObject({ command: 'railway up', exitCode: 2 });
      expect(lines).toContain('❌ railway up failed (exit code 2)');
      expect(lines).not.toContain('✅ Deployment complete!');
      expect(lines).not.toContain('📊 Useful Railway Commands');
    });
  });

  it('should honour a custom checklist from config', async () => {
    const custom = {
      ...config,
      requiredFiles: ['pyproject.toml'],
      envVars: [{ name: 'DATABASE_URL', description: 'Postgres connection string' }],
      secretVariable: undefined,
    };
    const { deps, lines } = createFakeDeps({ presentFiles: ['pyproject.toml'], answers: ['n'] });

    await expect(runDeployWorkflow(custom, deps)).rejects.toBeInstanceOf(OperatorDeclinedError);

    expect(lines).toContain('✅ pyproject.toml');
    expect(lines).toContain('  1. DATABASE_URL - Postgres connection string');
    expect(lines.some(line => line.startsWith('To generate a secure'))).toBe(false);
  });
});
