import * as fs from 'fs/promises';
import type { WorkflowGraph } from '../core/graph.js';
import type { SchemaRegistry } from '../core/schema-registry.js';
import type { DetectionToggle, DetectionToggles } from '../types.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type { DetectionContext } from './detection.js';

export const DEFAULT_DETECTION: DetectionToggles = {
  database: true,
  apiCalls: true,
  fileIo: true,
  messageQueues: true,
  dataTransforms: true,
};

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Decode file bytes as UTF-8, falling back to Latin-1 when the bytes are not
 * valid UTF-8. Latin-1 accepts every byte sequence.
 */
export function decodeSource(buffer: Buffer): { text: string; encoding: 'utf-8' | 'latin1' } {
  try {
    return { text: utf8.decode(buffer), encoding: 'utf-8' };
  } catch {
    return { text: buffer.toString('latin1'), encoding: 'latin1' };
  }
}

/**
 * Base class for all language scanners
 */
export abstract class BaseScanner {
  protected detect: DetectionToggles;
  private logger: Logger | null = null;

  constructor(detect: Partial<DetectionToggles> = {}) {
    this.detect = { ...DEFAULT_DETECTION, ...detect };
  }

  /**
   * Get the scanner name
   */
  abstract getName(): string;

  /**
   * Whether this scanner handles the file; depends on the path only
   */
  abstract canScan(filePath: string): boolean;

  /**
   * Scan one file into a graph fragment
   */
  abstract scanFile(filePath: string, registry?: SchemaRegistry): Promise<WorkflowGraph>;

  /**
   * Read a source file. Undecodable UTF-8 is read again as Latin-1; I/O
   * errors propagate to the caller.
   */
  protected async readFile(filePath: string): Promise<string> {
    const buffer = await fs.readFile(filePath);
    const { text, encoding } = decodeSource(buffer);
    if (encoding !== 'utf-8') {
      this.log(`${filePath}: not valid UTF-8, read as ${encoding}`);
    }
    return text;
  }

  /**
   * Read a companion file (template, code-behind). Returns null when it does not
   * exist or cannot be read, so the caller can scan the half it has.
   */
  protected async readCompanion(filePath: string): Promise<string | null> {
    try {
      return await this.readFile(filePath);
    } catch (error) {
      this.log(`No companion file at ${filePath}: ${(error as Error).message}`);
      return null;
    }
  }

  /**
   * Lines around `lineNumber` (1-based), `contextLines` either side
   */
  protected extractCodeSnippet(
    source: string | readonly string[],
    lineNumber: number,
    contextLines = 2
  ): string {
    const lines = typeof source === 'string' ? source.split('\n') : source;
    const start = Math.max(0, lineNumber - contextLines - 1);
    const end = Math.min(lines.length, lineNumber + contextLines);
    return lines.slice(start, end).join('\n');
  }

  protected shouldDetect(toggle: DetectionToggle): boolean {
    return this.detect[toggle];
  }

  protected detectionContext(
    filePath: string,
    content: string,
    registry?: SchemaRegistry
  ): DetectionContext {
    const lines = content.split('\n');
    return {
      filePath,
      content,
      registry,
      isEnabled: (toggle) => this.shouldDetect(toggle),
      snippet: (lineNumber) => this.extractCodeSnippet(lines, lineNumber),
    };
  }

  /**
   * Log scanning progress (silent by default, set FLOWSTORY_VERBOSE=1 to enable)
   */
  protected log(message: string): void {
    this.getLogger().log(message);
  }

  private getLogger(): Logger {
    if (!this.logger) this.logger = createLogger(this.getName());
    return this.logger;
  }
}
