import { randomUUID } from 'crypto';
import * as path from 'path';
import { analyzeWorkflows } from '../analyzers/workflow-analyzer.js';
import { resolveConfig } from '../config/config-loader.js';
import { WorkflowGraphBuilder } from '../core/graph-builder.js';
import { ProgressChannel } from '../core/progress.js';
import { serializeScanResult, type SerializedScanResult } from '../core/serialize.js';
import type { BaseScanner } from '../scanners/base-scanner.js';
import type {
  AnalysisStepState,
  DeepPartial,
  ProgressSink,
  ProgressSnapshot,
  ScanConfig,
  ScanStore,
} from '../types.js';
import { createLogger } from '../utils/logger.js';

export interface ScanRequest {
  repositoryPath: string;
  config?: DeepPartial<ScanConfig>;
}

export interface ScanServiceOptions {
  /** Defaults to random UUIDs */
  idFactory?: () => string;
  scanners?: BaseScanner[];
  /** Queued snapshots between the scan and the sink */
  channelCapacity?: number;
  /** Finished scans kept for wait() before the oldest are forgotten (default 100) */
  retainFinished?: number;
}

type Outcome = { ok: true; result: SerializedScanResult } | { ok: false; error: Error };

interface RunningScan {
  controller: AbortController;
  outcome: Promise<Outcome>;
  finished: boolean;
}

/**
 * Runs scans in the background. Progress flows through a ProgressChannel into
 * the sink; lifecycle state is written to the store.
 */
export class ScanService {
  private readonly logger = createLogger('ScanService');
  private readonly scans = new Map<string, RunningScan>();
  private readonly idFactory: () => string;

  constructor(
    private readonly store: ScanStore,
    private readonly sink: ProgressSink,
    private readonly options: ScanServiceOptions = {}
  ) {
    this.idFactory = options.idFactory ?? randomUUID;
  }

  /**
   * Register and start a scan. Resolves with its id once the record is saved;
   * the scan itself keeps running.
   */
  async start(request: ScanRequest): Promise<string> {
    const config = resolveConfig(request.config);
    const scanId = this.idFactory();
    const repositoryPath = path.resolve(request.repositoryPath);

    await this.store.save({
      scanId,
      repositoryPath,
      status: 'queued',
      startedAt: new Date().toISOString(),
      filesScanned: 0,
      nodesFound: 0,
      totalFiles: 0,
      errors: [],
    });
    await this.sink.publish(snapshot(scanId, 'queued', 0, 'Scan queued'));
    this.logger.log(`[${scanId}] queued ${repositoryPath}`);

    const controller = new AbortController();
    const scan: RunningScan = {
      controller,
      finished: false,
      outcome: this.run(scanId, repositoryPath, config, controller.signal)
        .then(
          (result): Outcome => ({ ok: true, result }),
          (error: unknown): Outcome => ({
            ok: false,
            error: error instanceof Error ? error : new Error(String(error)),
          })
        )
        .then((outcome) => {
          scan.finished = true;
          this.evictFinished();
          return outcome;
        }),
    };
    this.scans.set(scanId, scan);
    return scanId;
  }

  /**
   * Request cancellation. Returns false for unknown or finished scans.
   */
  cancel(scanId: string): boolean {
    const scan = this.scans.get(scanId);
    if (!scan || scan.finished) return false;
    scan.controller.abort();
    return true;
  }

  /**
   * Serialized result of a scan; rejects when the scan failed
   */
  async wait(scanId: string): Promise<SerializedScanResult> {
    const scan = this.scans.get(scanId);
    if (!scan) throw new Error(`Unknown scan: ${scanId}`);
    const outcome = await scan.outcome;
    if (!outcome.ok) throw outcome.error;
    return outcome.result;
  }

  isRunning(scanId: string): boolean {
    const scan = this.scans.get(scanId);
    return scan !== undefined && !scan.finished;
  }

  /**
   * Drop a finished scan and its progress. The store record is kept.
   * Returns false for unknown or running scans.
   */
  forget(scanId: string): boolean {
    const scan = this.scans.get(scanId);
    if (!scan || !scan.finished) return false;
    this.scans.delete(scanId);
    this.sink.forget(scanId);
    return true;
  }

  /**
   * Cancel every running scan and wait for them to settle
   */
  async dispose(): Promise<void> {
    const pending = [...this.scans.values()].filter((scan) => !scan.finished);
    for (const scan of pending) scan.controller.abort();
    await Promise.all(pending.map((scan) => scan.outcome));
  }

  private async run(
    scanId: string,
    repositoryPath: string,
    config: ScanConfig,
    signal: AbortSignal
  ): Promise<SerializedScanResult> {
    const channel = new ProgressChannel<ProgressSnapshot>(this.options.channelCapacity);
    const drained = this.drain(channel);

    try {
      await this.store.update(scanId, { status: 'discovering' });
      channel.push(snapshot(scanId, 'discovering', 0, 'Discovering files...'));

      // Workflow analysis runs here so it can report as its own step
      const builder = new WorkflowGraphBuilder(
        { ...config, analysis: { workflows: false } },
        this.options.scanners
      );
      const result = await builder.build(
        repositoryPath,
        (current, total, message, nodesFound) => {
          channel.push({
            ...snapshot(scanId, 'scanning', total > 0 ? (current / total) * 100 : 0, message),
            filesScanned: current,
            nodesFound,
            totalFiles: total,
          });
        },
        signal
      );

      const counts = {
        filesScanned: result.filesScanned,
        nodesFound: result.graph.nodes.length,
        totalFiles: result.totalFiles,
      };

      if (result.status === 'cancelled') {
        channel.push({ ...snapshot(scanId, 'cancelled', 0, 'Scan cancelled'), ...counts });
      } else {
        const steps: AnalysisStepState[] = [
          { name: 'Inferring Workflow Edges', status: 'completed', progress: 100 },
          {
            name: 'Analyzing UI Workflows',
            status: config.analysis.workflows ? 'in_progress' : 'completed',
            progress: config.analysis.workflows ? 0 : 100,
          },
        ];
        channel.push({
          ...snapshot(scanId, 'analyzing', 100, 'Analyzing UI workflows...'),
          ...counts,
          steps: steps.map((step) => ({ ...step })),
        });

        if (config.analysis.workflows) {
          result.workflows = analyzeWorkflows(result.graph).filter((workflow) => !workflow.trivial);
          steps[1] = { ...steps[1], status: 'completed', progress: 100 };
        }

        channel.push({
          ...snapshot(
            scanId,
            'completed',
            100,
            `Scan complete: ${counts.filesScanned} files, ${counts.nodesFound} nodes, ${result.workflows.length} workflows`
          ),
          ...counts,
          steps,
        });
      }

      await this.store.update(scanId, {
        ...counts,
        status: result.status,
        completedAt: new Date().toISOString(),
        scanDuration: result.scanTimeSeconds,
        errors: [...result.errors],
      });
      return serializeScanResult(result, scanId);
    } catch (error) {
      const message = (error as Error).message;
      this.logger.error(`[${scanId}] scan failed`, error);
      channel.push(snapshot(scanId, 'error', 0, `Scan failed: ${message}`));
      await this.store.update(scanId, {
        status: 'error',
        completedAt: new Date().toISOString(),
        errors: [message],
      });
      throw error;
    } finally {
      channel.close();
      await drained;
    }
  }

  private evictFinished(): void {
    const limit = this.options.retainFinished ?? 100;
    const finished = [...this.scans].filter(([, scan]) => scan.finished).map(([id]) => id);
    for (const scanId of finished.slice(0, Math.max(0, finished.length - limit))) {
      this.forget(scanId);
    }
  }

  private async drain(channel: ProgressChannel<ProgressSnapshot>): Promise<void> {
    for await (const item of channel) {
      try {
        await this.sink.publish(item);
      } catch (error) {
        this.logger.warn(`Progress sink failed for ${item.scanId}: ${(error as Error).message}`);
      }
    }
  }
}

function snapshot(
  scanId: string,
  status: ProgressSnapshot['status'],
  progressPercent: number,
  message: string
): ProgressSnapshot {
  return { scanId, status, progressPercent, message, filesScanned: 0, nodesFound: 0 };
}
