/**
 * Type definitions for the workflow scanner
 */
import type { WorkflowGraph } from './core/graph.js';
import type { WorkflowNode } from './core/model.js';
import type { SchemaRegistry } from './core/schema-registry.js';

// Configuration

export interface ScanConfig {
  scanner: ScannerConfig;
  schema: SchemaConfig;
  analysis: AnalysisConfig;
}

export interface ScannerConfig {
  /** File extensions to scan, with leading dot */
  includeExtensions: string[];
  /** Directory names never descended into */
  excludeDirs: string[];
  /** File name globs to skip (e.g. `*.min.js`) */
  excludePatterns: string[];
  /** Maximum number of files scanned at once */
  concurrency: number;
  progressEveryFiles: number;
  progressIntervalMs: number;
  detect: DetectionToggles;
  edgeInference: EdgeInferenceConfig;
}

export interface DetectionToggles {
  database: boolean;
  apiCalls: boolean;
  fileIo: boolean;
  messageQueues: boolean;
  dataTransforms: boolean;
}

export type DetectionToggle = keyof DetectionToggles;

export interface EdgeInferenceConfig {
  enabled: boolean;
  proximityEdges: boolean;
  dataFlowEdges: boolean;
  maxLineDistance: number;
  /** API call → DB write window, in lines */
  ingestionWindow: number;
  /** DB read → transform window, in lines */
  processingWindow: number;
}

export interface SchemaConfig {
  maxFiles: number;
  maxSchemas: number;
}

export interface AnalysisConfig {
  workflows: boolean;
}

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends unknown[] ? T[K] : T[K] extends object ? DeepPartial<T[K]> : T[K];
};

// Scan results

/**
 * Receives `(filesScanned, totalFiles, message, nodesFound)`
 */
export type ProgressCallback = (
  current: number,
  total: number,
  message: string,
  nodesFound: number
) => void;

export type ScanStatus = 'completed' | 'cancelled';

export interface ScanResult {
  repositoryPath: string;
  graph: WorkflowGraph;
  filesScanned: number;
  totalFiles: number;
  schemasDiscovered: SchemaRegistry;
  errors: string[];
  warnings: string[];
  scanTimeSeconds: number;
  status: ScanStatus;
  /** Non-trivial workflows, filled when workflow analysis is enabled */
  workflows: UIWorkflow[];
  commitHash: string;
}

// Workflows

export type InteractionType = 'button_click' | 'form_submit' | 'page_load';

/**
 * A user-facing entry point into the graph
 */
export interface UIInteraction {
  id: string;
  /** Humanized name, e.g. "Save Order" */
  name: string;
  component: string;
  interactionType: InteractionType;
  /** File the interaction lives in */
  location: string;
  description: string;
  node: WorkflowNode;
}

export interface WorkflowStep {
  stepNumber: number;
  title: string;
  description: string;
  technicalDetails: string;
  node: WorkflowNode;
  icon: string;
}

export interface UIWorkflow {
  id: string;
  name: string;
  trigger: UIInteraction;
  steps: WorkflowStep[];
  summary: string;
  outcome: string;
  /** No reachable steps */
  trivial: boolean;
}

// Collaborators

export type ScanLifecycleStatus =
  | 'queued'
  | 'discovering'
  | 'scanning'
  | 'analyzing'
  | 'completed'
  | 'cancelled'
  | 'error';

export interface AnalysisStepState {
  name: string;
  status: 'pending' | 'in_progress' | 'completed';
  progress: number;
}

export interface ProgressSnapshot {
  scanId: string;
  status: ScanLifecycleStatus;
  progressPercent: number;
  message: string;
  filesScanned: number;
  nodesFound: number;
  totalFiles?: number;
  steps?: AnalysisStepState[];
}

/**
 * Receives progress snapshots; may drop snapshots for slow viewers but always
 * answers with the last known state.
 */
export interface ProgressSink {
  publish(snapshot: ProgressSnapshot): void | Promise<void>;
  latest(scanId: string): ProgressSnapshot | undefined;
  /** Drop everything held for a scan */
  forget(scanId: string): void;
}

export interface ScanRecord {
  scanId: string;
  repositoryPath: string;
  status: ScanLifecycleStatus;
  startedAt: string;
  completedAt?: string;
  filesScanned: number;
  nodesFound: number;
  totalFiles: number;
  scanDuration?: number;
  errors: string[];
}

export interface ScanStore {
  save(record: ScanRecord): Promise<void>;
  update(scanId: string, patch: Partial<Omit<ScanRecord, 'scanId'>>): Promise<ScanRecord | null>;
  get(scanId: string): Promise<ScanRecord | null>;
  list(options?: { limit?: number; offset?: number }): Promise<ScanRecord[]>;
}
