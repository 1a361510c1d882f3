import * as fs from 'fs/promises';
import * as path from 'path';
import { parse } from 'yaml';
import { ConfigurationError } from '../errors.js';
import type { DeepPartial, ScanConfig } from '../types.js';

export const CONFIG_FILE_NAMES = ['flowstory.config.yaml', 'flowstory.config.yml'];

export const DEFAULT_SCAN_CONFIG: ScanConfig = {
  scanner: {
    includeExtensions: ['.cs', '.ts', '.tsx', '.js', '.jsx', '.html', '.xaml'],
    excludeDirs: [
      'node_modules',
      'bin',
      'obj',
      '.git',
      '.vs',
      'dist',
      'build',
      'coverage',
      '.next',
      '__pycache__',
      'venv',
    ],
    excludePatterns: ['*.min.js', '*.bundle.js', '*.generated.cs'],
    concurrency: 8,
    progressEveryFiles: 10,
    progressIntervalMs: 5000,
    detect: {
      database: true,
      apiCalls: true,
      fileIo: true,
      messageQueues: true,
      dataTransforms: true,
    },
    edgeInference: {
      enabled: true,
      proximityEdges: true,
      dataFlowEdges: true,
      maxLineDistance: 20,
      ingestionWindow: 50,
      processingWindow: 30,
    },
  },
  schema: {
    maxFiles: 2000,
    maxSchemas: 5000,
  },
  analysis: {
    workflows: true,
  },
};

type Section = Record<string, unknown>;

function isRecord(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describe(value: unknown): string {
  if (Array.isArray(value)) return 'a list';
  if (value === null) return 'null';
  return `a ${typeof value}`;
}

/**
 * Typed reads from one mapping of the raw config, with the dotted key path
 * used in error messages. Missing keys fall back to the defaults.
 */
class SectionReader {
  private readonly section: Section;

  constructor(
    raw: unknown,
    private readonly keyPath: string
  ) {
    if (raw === undefined || raw === null) {
      this.section = {};
    } else if (isRecord(raw)) {
      this.section = raw;
    } else {
      throw new ConfigurationError(`${keyPath || 'config'} must be a mapping, got ${describe(raw)}`);
    }
  }

  child(key: string): SectionReader {
    return new SectionReader(this.section[key], this.path(key));
  }

  boolean(key: string, fallback: boolean): boolean {
    const value = this.section[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'boolean') {
      throw new ConfigurationError(`${this.path(key)} must be a boolean, got ${describe(value)}`);
    }
    return value;
  }

  integer(key: string, fallback: number, min = 0): number {
    const value = this.section[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'number' || !Number.isInteger(value)) {
      throw new ConfigurationError(`${this.path(key)} must be an integer, got ${describe(value)}`);
    }
    if (value < min) {
      throw new ConfigurationError(`${this.path(key)} must be at least ${min}, got ${value}`);
    }
    return value;
  }

  strings(key: string, fallback: readonly string[]): string[] {
    const value = this.section[key];
    if (value === undefined) return [...fallback];
    if (!Array.isArray(value)) {
      throw new ConfigurationError(`${this.path(key)} must be a list, got ${describe(value)}`);
    }
    return value.map((item, index) => {
      if (typeof item !== 'string') {
        throw new ConfigurationError(
          `${this.path(key)}[${index}] must be a string, got ${describe(item)}`
        );
      }
      return item;
    });
  }

  private path(key: string): string {
    return this.keyPath ? `${this.keyPath}.${key}` : key;
  }
}

/**
 * Fill a partial configuration with defaults. Unknown keys are ignored;
 * values of the wrong type raise ConfigurationError.
 */
export function resolveConfig(input: DeepPartial<ScanConfig> = {}): ScanConfig {
  return readConfig(input);
}

/**
 * Same as resolveConfig, for values of unknown shape such as parsed YAML
 */
export function readConfig(input: unknown): ScanConfig {
  const defaults = DEFAULT_SCAN_CONFIG;
  const root = new SectionReader(input, '');

  const scanner = root.child('scanner');
  const detect = scanner.child('detect');
  const edges = scanner.child('edgeInference');
  const schema = root.child('schema');
  const analysis = root.child('analysis');

  const d = defaults.scanner;
  return {
    scanner: {
      includeExtensions: scanner.strings('includeExtensions', d.includeExtensions),
      excludeDirs: scanner.strings('excludeDirs', d.excludeDirs),
      excludePatterns: scanner.strings('excludePatterns', d.excludePatterns),
      concurrency: scanner.integer('concurrency', d.concurrency, 1),
      progressEveryFiles: scanner.integer('progressEveryFiles', d.progressEveryFiles, 1),
      progressIntervalMs: scanner.integer('progressIntervalMs', d.progressIntervalMs),
      detect: {
        database: detect.boolean('database', d.detect.database),
        apiCalls: detect.boolean('apiCalls', d.detect.apiCalls),
        fileIo: detect.boolean('fileIo', d.detect.fileIo),
        messageQueues: detect.boolean('messageQueues', d.detect.messageQueues),
        dataTransforms: detect.boolean('dataTransforms', d.detect.dataTransforms),
      },
      edgeInference: {
        enabled: edges.boolean('enabled', d.edgeInference.enabled),
        proximityEdges: edges.boolean('proximityEdges', d.edgeInference.proximityEdges),
        dataFlowEdges: edges.boolean('dataFlowEdges', d.edgeInference.dataFlowEdges),
        maxLineDistance: edges.integer('maxLineDistance', d.edgeInference.maxLineDistance),
        ingestionWindow: edges.integer('ingestionWindow', d.edgeInference.ingestionWindow),
        processingWindow: edges.integer('processingWindow', d.edgeInference.processingWindow),
      },
    },
    schema: {
      maxFiles: schema.integer('maxFiles', defaults.schema.maxFiles),
      maxSchemas: schema.integer('maxSchemas', defaults.schema.maxSchemas),
    },
    analysis: {
      workflows: analysis.boolean('workflows', defaults.analysis.workflows),
    },
  };
}

/**
 * Replace `${VAR}` and `${VAR:-default}` with environment values. An unset
 * variable without a default becomes an empty string.
 */
export function expandEnv(text: string, env: NodeJS.ProcessEnv = process.env): string {
  return text.replace(
    /\$\{([A-Za-z_][A-Za-z0-9_]*)(?::-([^}]*))?\}/g,
    (_match, name: string, fallback: string | undefined) => {
      const value = env[name];
      if (value !== undefined && value !== '') return value;
      return fallback ?? '';
    }
  );
}

/**
 * Parse a YAML config file into a full configuration
 */
export async function loadConfigFile(
  filePath: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<ScanConfig> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read config file ${filePath}: ${(error as Error).message}`);
  }

  let raw: unknown;
  try {
    raw = parse(expandEnv(text, env));
  } catch (error) {
    throw new ConfigurationError(`Invalid YAML in ${filePath}: ${(error as Error).message}`);
  }
  return readConfig(raw);
}

/**
 * Load config from an explicit path, else from the first config file found in
 * `cwd`, else the defaults. Returns the path that was used, if any.
 */
export async function loadConfig(
  configPath: string | null | undefined,
  cwd: string
): Promise<{ config: ScanConfig; source: string | null }> {
  if (configPath) {
    const fullPath = path.resolve(cwd, configPath);
    return { config: await loadConfigFile(fullPath), source: fullPath };
  }

  for (const file of CONFIG_FILE_NAMES) {
    const fullPath = path.resolve(cwd, file);
    const exists = await fs
      .access(fullPath)
      .then(() => true)
      .catch(() => false);
    if (exists) {
      return { config: await loadConfigFile(fullPath), source: fullPath };
    }
  }

  return { config: resolveConfig({}), source: null };
}

/**
 * Commented YAML template written by `flowstory init`
 */
export function configTemplate(): string {
  const d = DEFAULT_SCAN_CONFIG;
  const list = (items: readonly string[]): string =>
    `[${items.map((item) => `'${item}'`).join(', ')}]`;
  return `# flowstory configuration
scanner:
  includeExtensions: ${list(d.scanner.includeExtensions)}
  excludeDirs: ${list(d.scanner.excludeDirs)}
  excludePatterns: ${list(d.scanner.excludePatterns)}
  # Files scanned at once
  concurrency: ${d.scanner.concurrency}
  progressEveryFiles: ${d.scanner.progressEveryFiles}
  progressIntervalMs: ${d.scanner.progressIntervalMs}
  detect:
    database: ${d.scanner.detect.database}
    apiCalls: ${d.scanner.detect.apiCalls}
    fileIo: ${d.scanner.detect.fileIo}
    messageQueues: ${d.scanner.detect.messageQueues}
    dataTransforms: ${d.scanner.detect.dataTransforms}
  edgeInference:
    enabled: ${d.scanner.edgeInference.enabled}
    proximityEdges: ${d.scanner.edgeInference.proximityEdges}
    dataFlowEdges: ${d.scanner.edgeInference.dataFlowEdges}
    maxLineDistance: ${d.scanner.edgeInference.maxLineDistance}
    # API call -> DB write, in lines
    ingestionWindow: ${d.scanner.edgeInference.ingestionWindow}
    # DB read -> transform, in lines
    processingWindow: ${d.scanner.edgeInference.processingWindow}
schema:
  maxFiles: ${d.schema.maxFiles}
  maxSchemas: ${d.schema.maxSchemas}
analysis:
  workflows: ${d.analysis.workflows}
`;
}
