import { describe, it, expect } from 'vitest';
import { resolveSettings } from '../../../src/config/config.js';
import { renderPaths, renderSettings } from '../../../src/cli/output.js';
import { describeError } from '../../../src/cli/errors.js';
import { ExitCode, MissingRequiredConfigurationError } from '../../../src/errors.js';

const settings = resolveSettings('TEST', {
  env: { GRAPHVCS_NEO4J_PASSWORD: 'test-secret' },
  cwd: '/work/project',
  envFile: false,
});

describe('CLI output', () => {
  describe('renderSettings', () => {
    it('should mask the password in JSON output', () => {
      const parsed = JSON.parse(renderSettings(settings, { json: true })) as Record<string, unknown>;

      expect(parsed.neo4jPassword).toBe('********');
      expect(parsed.appName).toBe('graphvcs');
      expect(parsed.environment).toBe('TEST');
    });

    it('should align keys in plain output', () => {
      const lines = renderSettings(settings).split('\n');

      expect(lines).toContain(`${'appName'.padEnd(18)}  graphvcs`);
      expect(lines).toContain(`${'neo4jPassword'.padEnd(18)}  ********`);
      expect(lines).toContain(`${'compressionEnabled'}  true`);
    });
  });

  describe('renderPaths', () => {
    const paths = {
      repo: '/r/.gvcs',
      objects: '/r/.gvcs/objects',
      refs: '/r/.gvcs/refs',
      logs: '/r/.gvcs/logs',
    };

    it('should render labelled lines', () => {
      expect(renderPaths(paths)).toBe(
        [
          'Repository: /r/.gvcs',
          'Objects:    /r/.gvcs/objects',
          'Refs:       /r/.gvcs/refs',
          'Logs:       /r/.gvcs/logs',
        ].join('\n')
      );
    });

    it('should render JSON', () => {
      expect(JSON.parse(renderPaths(paths, { json: true }))).toEqual(paths);
    });
  });

  describe('describeError', () => {
    it('should use the exit code of graphvcs errors', () => {
      const error = new MissingRequiredConfigurationError(['neo4jUri'], ['GRAPHVCS_NEO4J_URI']);

      expect(describeError(error)).toEqual({
        exitCode: ExitCode.CONFIG_ERROR,
        message: 'Missing required configuration: neo4jUri (set GRAPHVCS_NEO4J_URI)',
      });
    });

    it('should treat other errors as general errors', () => {
      expect(describeError(new Error('boom'))).toEqual({
        exitCode: ExitCode.GENERAL_ERROR,
        message: 'boom',
      });
      expect(describeError('plain')).toEqual({ exitCode: ExitCode.GENERAL_ERROR, message: 'plain' });
    });
  });
});
