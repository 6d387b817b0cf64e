import { CoreError, CoreErrorCode } from '../shared/errors.js';
import type { LaunchConfiguration } from './types.js';

/** Attribute keys understood by StaticLaunchConfiguration. */
export const LaunchAttribute = {
  PROCESS_LABEL: 'process.label',
  ENVIRONMENT_VARIABLES: 'environmentVariables',
  APPEND_ENVIRONMENT: 'appendEnvironment',
} as const;

export interface StaticLaunchAttributes {
  [LaunchAttribute.PROCESS_LABEL]?: string;
  /** Values may reference the launcher's environment as ${env_var:NAME}. */
  [LaunchAttribute.ENVIRONMENT_VARIABLES]?: Record<string, string>;
  /** Overlay the variables on the launcher's environment (default) instead of replacing it. */
  [LaunchAttribute.APPEND_ENVIRONMENT]?: boolean;
  [key: string]: string | boolean | Record<string, string> | undefined;
}

const VARIABLE_REF = /\$\{([^}:]+)(?::([^}]*))?\}/g;

export class StaticLaunchConfiguration implements LaunchConfiguration {
  constructor(
    readonly name: string,
    private readonly attributes: StaticLaunchAttributes = {},
    private readonly nativeEnv: NodeJS.ProcessEnv = process.env
  ) {}

  getAttribute(key: string, defaultValue: string): string {
    const value = this.attributes[key];
    return typeof value === 'string' ? value : defaultValue;
  }

  async resolveEnvironment(): Promise<Record<string, string> | undefined> {
    const variables = this.attributes[LaunchAttribute.ENVIRONMENT_VARIABLES];
    if (variables === undefined) return undefined;

    const resolved: Record<string, string> = {};
    for (const [name, value] of Object.entries(variables)) {
      resolved[name] = this.expand(name, value);
    }

    if (this.attributes[LaunchAttribute.APPEND_ENVIRONMENT] === false) return resolved;
    return { ...this.nativeEnvironment(), ...resolved };
  }

  private nativeEnvironment(): Record<string, string> {
    const env: Record<string, string> = {};
    for (const [name, value] of Object.entries(this.nativeEnv)) {
      if (value !== undefined) env[name] = value;
    }
    return env;
  }

  private expand(name: string, value: string): string {
    return value.replace(VARIABLE_REF, (_match, variable: string, argument: string | undefined) => {
      if (variable === 'env_var' && argument !== undefined && argument.length > 0) {
        return this.nativeEnv[argument] ?? '';
      }
      throw new CoreError(
        CoreErrorCode.ENVIRONMENT_RESOLUTION_FAILED,
        `Unknown variable reference \${${variable}${argument !== undefined ? ':' + argument : ''}} in ${name} of launch configuration ${this.name}`,
        { context: { configuration: this.name, variable: name } }
      );
    });
  }
}
