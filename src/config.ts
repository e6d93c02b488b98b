import * as fs from 'fs';
import * as path from 'path';
import { Vocabularies } from './types';
import { createVocabularies } from './vocabularies';

/**
 * Configuration schema for ui-flow
 */
export interface UiFlowConfig {
  /**
   * Extra method names that construct a UI element
   * @example ["imageButton", "colorEdit"]
   */
  uiMethods?: string[];

  /**
   * Extra method names that query an action on an element
   * @example ["longPressed"]
   */
  actionMethods?: string[];

  /**
   * Extra method names treated as mutating their receiver
   * @example ["reset", "swap"]
   */
  mutatingMethods?: string[];

  /**
   * Extra design-system component names whose handlers emit messages
   * @example ["Toggle", "Select"]
   */
  dsComponents?: string[];

  /**
   * Extra methods that attach a message to a component
   * @example ["onSubmit"]
   */
  dsActions?: string[];

  /**
   * Files or patterns to ignore during analysis
   * Example: ["src/generated/**", "**\/*.test.ts"]
   */
  ignore?: string[];

  /**
   * Keep flows whose UI element could not be identified at all ('unknown').
   * @default true
   */
  includeUnresolved?: boolean;
}

const CONFIG_FILES = ['uiflow.config.js', 'uiflow.config.json', '.uiflowrc', '.uiflowrc.json'];

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: Required<UiFlowConfig> = {
  uiMethods: [],
  actionMethods: [],
  mutatingMethods: [],
  dsComponents: [],
  dsActions: [],
  ignore: [],
  includeUnresolved: true,
};

/**
 * Result of loading config, including where it came from
 */
export interface LoadConfigResult {
  config: Required<UiFlowConfig>;
  configPath: string | null;
}

/**
 * Load configuration from the nearest config file
 * @param startDir Directory to start searching from
 * @returns Merged configuration with defaults
 */
export function loadConfig(startDir: string): Required<UiFlowConfig> {
  return loadConfigWithInfo(startDir).config;
}

/**
 * Load configuration and report which file it came from
 * @param startDir Directory to start searching from
 */
export function loadConfigWithInfo(startDir: string): LoadConfigResult {
  const configPath = findConfigFile(startDir);
  let userConfig: UiFlowConfig = {};

  if (configPath) {
    try {
      userConfig = loadConfigFile(configPath);
    } catch (error) {
      console.warn(`Warning: Could not load config from ${configPath}:`, error);
    }
  }

  return {
    config: mergeConfig(DEFAULT_CONFIG, userConfig),
    configPath,
  };
}

/**
 * Find the nearest config file by walking up the directory tree
 */
function findConfigFile(startDir: string): string | null {
  let dir = path.resolve(startDir);
  // A file target starts the search in its directory
  if (fs.existsSync(dir) && fs.statSync(dir).isFile()) {
    dir = path.dirname(dir);
  }
  const root = path.parse(dir).root;

  while (dir !== root) {
    for (const configFile of CONFIG_FILES) {
      const configPath = path.join(dir, configFile);
      if (fs.existsSync(configPath)) {
        return configPath;
      }
    }
    dir = path.dirname(dir);
  }

  return null;
}

/**
 * Load and parse a config file
 */
function loadConfigFile(configPath: string): UiFlowConfig {
  const ext = path.extname(configPath);

  if (ext === '.json' || path.basename(configPath) === '.uiflowrc') {
    const content = fs.readFileSync(configPath, 'utf-8');
    return validateConfig(JSON.parse(content), configPath);
  }

  if (ext === '.js') {
    const loaded: unknown = require(configPath);
    const config =
      loaded && typeof loaded === 'object' && 'default' in loaded ? loaded.default : loaded;
    return validateConfig(config, configPath);
  }

  throw new Error(`Unsupported config file format: ${ext}`);
}

/**
 * Check the shape of a loaded config object
 */
function validateConfig(value: unknown, configPath: string): UiFlowConfig {
  if (!isRecord(value)) {
    throw new Error(`Config in ${configPath} must be an object`);
  }

  const config: UiFlowConfig = {};

  const listKeys = [
    'uiMethods',
    'actionMethods',
    'mutatingMethods',
    'dsComponents',
    'dsActions',
    'ignore',
  ] as const;

  for (const key of listKeys) {
    const entry = value[key];
    if (entry === undefined) continue;
    if (!Array.isArray(entry) || !entry.every((item): item is string => typeof item === 'string')) {
      throw new Error(`Config option "${key}" in ${configPath} must be an array of strings`);
    }
    config[key] = entry;
  }

  if (value.includeUnresolved !== undefined) {
    if (typeof value.includeUnresolved !== 'boolean') {
      throw new Error(`Config option "includeUnresolved" in ${configPath} must be a boolean`);
    }
    config.includeUnresolved = value.includeUnresolved;
  }

  return config;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge user config with defaults
 */
export function mergeConfig(
  defaults: Required<UiFlowConfig>,
  userConfig: Partial<UiFlowConfig>
): Required<UiFlowConfig> {
  return {
    uiMethods: [...defaults.uiMethods, ...(userConfig.uiMethods || [])],
    actionMethods: [...defaults.actionMethods, ...(userConfig.actionMethods || [])],
    mutatingMethods: [...defaults.mutatingMethods, ...(userConfig.mutatingMethods || [])],
    dsComponents: [...defaults.dsComponents, ...(userConfig.dsComponents || [])],
    dsActions: [...defaults.dsActions, ...(userConfig.dsActions || [])],
    ignore: [...defaults.ignore, ...(userConfig.ignore || [])],
    includeUnresolved: userConfig.includeUnresolved ?? defaults.includeUnresolved,
  };
}

/**
 * Vocabularies for the extractor: the built-in names plus the config's extras
 */
export function toVocabularies(config: UiFlowConfig): Vocabularies {
  return createVocabularies({
    uiMethods: config.uiMethods,
    actionMethods: config.actionMethods,
    mutatingMethods: config.mutatingMethods,
    dsComponents: config.dsComponents,
    dsActions: config.dsActions,
  });
}
