/**
 * Runtime configuration.
 */
export interface BoughConfig {
  /**
   * Throw on use of a node or cursor whose tree was deleted, instead of
   * handing the stale handle to the engine.
   */
  livenessChecks: boolean;
  /** Write debug lines through console.debug */
  debug: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: Readonly<BoughConfig> = {
  livenessChecks: true,
  debug: false,
};

const ENV_KEYS = [
  ['livenessChecks', 'BOUGH_LIVENESS_CHECKS'],
  ['debug', 'BOUGH_DEBUG'],
] as const;

let current: BoughConfig | null = null;

/**
 * Parse a boolean environment value. Unrecognized values yield undefined.
 */
function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  return undefined;
}

/**
 * Build a configuration from environment variables, merging with defaults.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): BoughConfig {
  const config: BoughConfig = { ...DEFAULT_CONFIG };
  for (const [key, variable] of ENV_KEYS) {
    const flag = parseFlag(env[variable]);
    if (flag !== undefined) {
      config[key] = flag;
    }
  }
  return config;
}

/**
 * Active configuration. Read from the environment on first use.
 */
export function getConfig(): Readonly<BoughConfig> {
  if (!current) {
    current = loadConfigFromEnv();
  }
  return current;
}

/**
 * Override part of the active configuration.
 */
export function configure(overrides: Partial<BoughConfig>): Readonly<BoughConfig> {
  current = { ...getConfig(), ...overrides };
  return current;
}

/**
 * Drop overrides; the next read goes back to the environment.
 */
export function resetConfig(): void {
  current = null;
}

export function getConfigValue<K extends keyof BoughConfig>(key: K): BoughConfig[K] {
  return getConfig()[key];
}

export function setConfigValue<K extends keyof BoughConfig>(key: K, value: BoughConfig[K]): void {
  const overrides: Partial<BoughConfig> = {};
  overrides[key] = value;
  configure(overrides);
}
