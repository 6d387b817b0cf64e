import { LaunchAttribute, StaticLaunchConfiguration } from '../../../src/launch/configuration.js';
import { CoreErrorCode } from '../../../src/shared/errors.js';

const nativeEnv = { PATH: '/usr/bin', HOME: '/home/dev', UNSET: undefined };

describe('StaticLaunchConfiguration', () => {
  it('returns string attributes and falls back to the default', () => {
    const config = new StaticLaunchConfiguration('build', { [LaunchAttribute.PROCESS_LABEL]: 'Build app' });
    expect(config.getAttribute(LaunchAttribute.PROCESS_LABEL, 'make')).toBe('Build app');
    expect(config.getAttribute('missing', 'fallback')).toBe('fallback');
    expect(config.getAttribute(LaunchAttribute.APPEND_ENVIRONMENT, 'x')).toBe('x');
  });

  it('inherits the environment when it declares no variables', async () => {
    const config = new StaticLaunchConfiguration('plain', {}, nativeEnv);
    await expect(config.resolveEnvironment()).resolves.toBeUndefined();
  });

  it('overlays its variables on the native environment by default', async () => {
    const config = new StaticLaunchConfiguration(
      'overlay',
      { [LaunchAttribute.ENVIRONMENT_VARIABLES]: { PATH: '/opt/bin', MODE: 'test' } },
      nativeEnv
    );
    await expect(config.resolveEnvironment()).resolves.toEqual({
      PATH: '/opt/bin',
      HOME: '/home/dev',
      MODE: 'test',
    });
  });

  it('replaces the native environment when appending is off', async () => {
    const config = new StaticLaunchConfiguration(
      'replace',
      {
        [LaunchAttribute.ENVIRONMENT_VARIABLES]: { MODE: 'test' },
        [LaunchAttribute.APPEND_ENVIRONMENT]: false,
      },
      nativeEnv
    );
    await expect(config.resolveEnvironment()).resolves.toEqual({ MODE: 'test' });
  });

  it('expands env_var references against the native environment', async () => {
    const config = new StaticLaunchConfiguration(
      'expand',
      {
        [LaunchAttribute.ENVIRONMENT_VARIABLES]: { PATH: '/opt/bin:${env_var:PATH}', GONE: '${env_var:NOPE}' },
        [LaunchAttribute.APPEND_ENVIRONMENT]: false,
      },
      nativeEnv
    );
    await expect(config.resolveEnvironment()).resolves.toEqual({ PATH: '/opt/bin:/usr/bin', GONE: '' });
  });

  it('fails on unknown variable references', async () => {
    const config = new StaticLaunchConfiguration(
      'broken',
      { [LaunchAttribute.ENVIRONMENT_VARIABLES]: { X: '${workspace_loc}' } },
      nativeEnv
    );
    await expect(config.resolveEnvironment()).rejects.toMatchObject({
      code: CoreErrorCode.ENVIRONMENT_RESOLUTION_FAILED,
      message: 'Unknown variable reference ${workspace_loc} in X of launch configuration broken',
    });
  });
});
