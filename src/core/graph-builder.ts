import * as fs from 'fs/promises';
import * as path from 'path';
import fg from 'fast-glob';
import { simpleGit } from 'simple-git';
import { SchemaResolver } from '../analyzers/schema-resolver.js';
import { analyzeWorkflows } from '../analyzers/workflow-analyzer.js';
import { resolveConfig } from '../config/config-loader.js';
import { ConfigurationError } from '../errors.js';
import type { BaseScanner } from '../scanners/base-scanner.js';
import { createDefaultScanners, selectScanner } from '../scanners/index.js';
import type { DeepPartial, ProgressCallback, ScanConfig, ScanResult } from '../types.js';
import { createLogger } from '../utils/logger.js';
import { parallelMap } from '../utils/parallel.js';
import { EdgeInferenceEngine } from './edge-inference.js';
import { WorkflowGraph } from './graph.js';
import { SchemaRegistry } from './schema-registry.js';

export interface BuildOptions {
  /** Cooperative cancellation, checked before every file */
  signal?: AbortSignal;
  /** Replaces the default scanner list */
  scanners?: BaseScanner[];
}

/**
 * Repository commit, or `unknown` outside a git work tree
 */
export async function getCommitHash(repositoryPath: string): Promise<string> {
  try {
    const git = simpleGit(repositoryPath);
    if (!(await git.checkIsRepo())) return 'unknown';
    const log = await git.log({ n: 1 });
    return log.latest?.hash || 'unknown';
  } catch {
    return 'unknown';
  }
}

function formatEta(seconds: number): string {
  const whole = Math.max(0, Math.round(seconds));
  return `${Math.floor(whole / 60)}m ${whole % 60}s`;
}

/**
 * Orchestrates a scan: discovery, schema pre-pass, the scan loop, edge
 * inference and workflow analysis
 */
export class WorkflowGraphBuilder {
  private readonly logger = createLogger('GraphBuilder');
  private readonly scanners: BaseScanner[];

  constructor(
    private readonly config: ScanConfig,
    scanners?: BaseScanner[]
  ) {
    this.scanners = scanners ?? createDefaultScanners(config.scanner.detect);
  }

  async build(
    repositoryPath: string,
    onProgress?: ProgressCallback,
    signal?: AbortSignal
  ): Promise<ScanResult> {
    const root = path.resolve(repositoryPath);
    await this.validateRoot(root);

    const startTime = Date.now();
    const result: ScanResult = {
      repositoryPath: root,
      graph: new WorkflowGraph(),
      filesScanned: 0,
      totalFiles: 0,
      schemasDiscovered: new SchemaRegistry(),
      errors: [],
      warnings: [],
      scanTimeSeconds: 0,
      status: 'completed',
      workflows: [],
      commitHash: 'unknown',
    };

    const notify = (current: number, total: number, message: string): void => {
      if (!onProgress) return;
      try {
        onProgress(current, total, message, result.graph.nodes.length);
      } catch (error) {
        result.warnings.push(`Progress callback failed: ${(error as Error).message}`);
      }
    };

    const files = await this.findFiles(root);
    const total = files.length;
    result.totalFiles = total;
    this.logger.log(`Found ${total} files under ${root}`);
    notify(0, total, `Found ${total} files to scan`);

    const backendFiles = files.filter((file) => file.endsWith('.cs'));
    if (backendFiles.length > 0) {
      const resolution = await new SchemaResolver(this.config.schema).resolve(
        backendFiles,
        this.config.scanner.concurrency
      );
      result.schemasDiscovered = resolution.registry;
      result.warnings.push(...resolution.warnings);
    }
    const registry = result.schemasDiscovered;

    const { progressEveryFiles, progressIntervalMs } = this.config.scanner;
    let lastReport = Date.now();

    await parallelMap(
      files,
      async (filePath) => {
        if (signal?.aborted) return;
        const scanner = selectScanner(this.scanners, filePath);
        if (!scanner) return;

        try {
          const fragment = await scanner.scanFile(filePath, registry);
          // Single merge point: runs to completion before any other worker resumes
          result.graph.merge(fragment);
          result.filesScanned++;
        } catch (error) {
          const message = `Error scanning ${filePath}: ${(error as Error).message}`;
          result.errors.push(message);
          this.logger.warn(message);
          return;
        }

        const now = Date.now();
        if (result.filesScanned % progressEveryFiles === 0 || now - lastReport >= progressIntervalMs) {
          lastReport = now;
          notify(result.filesScanned, total, this.progressMessage(result, total, startTime, now));
        }
      },
      this.config.scanner.concurrency,
      signal
    );

    if (signal?.aborted) {
      result.status = 'cancelled';
      notify(result.filesScanned, total, `Scan cancelled: ${result.filesScanned} files processed`);
      result.scanTimeSeconds = (Date.now() - startTime) / 1000;
      return result;
    }

    notify(total, total, `File scanning complete: ${result.filesScanned} files processed`);

    if (this.config.scanner.edgeInference.enabled) {
      notify(total, total, 'Inferring workflow edges...');
      new EdgeInferenceEngine(this.config.scanner.edgeInference).infer(result.graph);
    }

    if (this.config.analysis.workflows) {
      notify(total, total, 'Analyzing UI workflows...');
      result.workflows = analyzeWorkflows(result.graph).filter((workflow) => !workflow.trivial);
    }

    result.commitHash = await getCommitHash(root);
    result.scanTimeSeconds = (Date.now() - startTime) / 1000;
    this.logger.log(
      `Scan complete: ${result.filesScanned} files, ${result.graph.nodes.length} nodes, ${result.graph.edges.length} edges`
    );
    return result;
  }

  /**
   * Files to scan, sorted. Excluded and hidden directories are never entered.
   */
  async findFiles(root: string): Promise<string[]> {
    const { includeExtensions, excludeDirs, excludePatterns } = this.config.scanner;
    if (includeExtensions.length === 0) return [];

    const files = await fg(
      includeExtensions.map((ext) => `**/*${ext}`),
      {
        cwd: root,
        absolute: true,
        onlyFiles: true,
        dot: false,
        ignore: [
          ...excludeDirs.map((dir) => `**/${dir}/**`),
          ...excludePatterns.map((pattern) => `**/${pattern}`),
        ],
      }
    );
    return files.map((file) => path.normalize(file)).sort();
  }

  private async validateRoot(root: string): Promise<void> {
    const stat = await fs.stat(root).catch(() => null);
    if (!stat) {
      throw new ConfigurationError(`Repository path does not exist: ${root}`);
    }
    if (!stat.isDirectory()) {
      throw new ConfigurationError(`Repository path is not a directory: ${root}`);
    }
  }

  private progressMessage(result: ScanResult, total: number, startTime: number, now: number): string {
    const scanned = result.filesScanned;
    const percent = total > 0 ? (scanned / total) * 100 : 100;
    const elapsed = (now - startTime) / 1000;
    const eta = scanned > 0 ? formatEta((elapsed / scanned) * (total - scanned)) : 'calculating...';
    return `[${percent.toFixed(1).padStart(5)}%] ${scanned}/${total} files | Nodes: ${result.graph.nodes.length} | ETA: ${eta}`;
  }
}

/**
 * Scan a repository into a workflow graph
 */
export async function build(
  repositoryPath: string,
  config: DeepPartial<ScanConfig> = {},
  onProgress?: ProgressCallback,
  options: BuildOptions = {}
): Promise<ScanResult> {
  const builder = new WorkflowGraphBuilder(resolveConfig(config), options.scanners);
  return builder.build(repositoryPath, onProgress, options.signal);
}
