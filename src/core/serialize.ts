import { toStory } from '../analyzers/workflow-analyzer.js';
import type { ScanResult, UIWorkflow } from '../types.js';
import type { WorkflowGraph } from './graph.js';
import type { NodeMetadata, WorkflowEdge, WorkflowNode } from './model.js';

// Wire shapes consumed by renderers and stored as results.json

export interface SerializedLocation {
  file_path: string;
  line_number: number;
}

export interface SerializedNode {
  id: string;
  type: string;
  name: string;
  description: string;
  location: SerializedLocation;
  metadata: Record<string, unknown>;
  code_snippet: string | null;
  table_name: string | null;
  query: string | null;
  endpoint: string | null;
  http_method: string | null;
  /** Target of a file operation, not the node's own location */
  file_path: string | null;
  queue_name: string | null;
  topic: string | null;
}

export interface SerializedEdge {
  source: string;
  target: string;
  label: string | null;
  edge_type: string | null;
  metadata: Record<string, unknown>;
}

export interface SerializedStep {
  step_number: number;
  title: string;
  description: string;
  technical_details: string;
  icon: string;
  node_id: string;
}

export interface SerializedWorkflow {
  id: string;
  name: string;
  summary: string;
  outcome: string;
  trigger: {
    name: string;
    description: string;
    interaction_type: string;
    component: string;
    location: string;
  };
  steps: SerializedStep[];
  story: string;
}

export interface SerializedGraph {
  nodes: SerializedNode[];
  edges: SerializedEdge[];
}

export interface SerializedScanResult extends SerializedGraph {
  scan_id: string;
  repository_path: string;
  status: string;
  commit_hash: string;
  files_scanned: number;
  total_files: number;
  workflows: SerializedWorkflow[];
  scan_time_seconds: number;
  scan_duration: number;
  errors: string[];
  warnings: string[];
}

/**
 * `isUiTrigger` → `is_ui_trigger`
 */
export function snakeCase(key: string): string {
  return key.replace(/([a-z0-9])([A-Z])/g, '$1_$2').toLowerCase();
}

function snakeKeys(metadata: NodeMetadata): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(metadata)) {
    out[snakeCase(key)] = value;
  }
  return out;
}

export function serializeNode(node: WorkflowNode): SerializedNode {
  return {
    id: node.id,
    type: node.type,
    name: node.name,
    description: node.description,
    location: {
      file_path: node.location.filePath,
      line_number: node.location.lineNumber,
    },
    metadata: snakeKeys(node.metadata),
    code_snippet: node.codeSnippet ?? null,
    table_name: node.tableName ?? null,
    query: node.query ?? null,
    endpoint: node.endpoint ?? null,
    http_method: node.method ?? null,
    file_path: node.filePath ?? null,
    queue_name: node.queueName ?? null,
    topic: node.topic ?? null,
  };
}

export function serializeEdge(edge: WorkflowEdge): SerializedEdge {
  return {
    source: edge.source,
    target: edge.target,
    label: edge.label ?? null,
    edge_type: edge.label ?? null,
    metadata: snakeKeys(edge.metadata),
  };
}

export function serializeGraph(graph: WorkflowGraph): SerializedGraph {
  return {
    nodes: graph.nodes.map(serializeNode),
    edges: graph.edges.map(serializeEdge),
  };
}

export function serializeWorkflows(workflows: readonly UIWorkflow[]): SerializedWorkflow[] {
  return workflows.map((workflow) => ({
    id: workflow.id,
    name: workflow.name,
    summary: workflow.summary,
    outcome: workflow.outcome,
    trigger: {
      name: workflow.trigger.name,
      description: workflow.trigger.description,
      interaction_type: workflow.trigger.interactionType,
      component: workflow.trigger.component,
      location: workflow.trigger.location,
    },
    steps: workflow.steps.map((step) => ({
      step_number: step.stepNumber,
      title: step.title,
      description: step.description,
      technical_details: step.technicalDetails,
      icon: step.icon,
      node_id: step.node.id,
    })),
    story: toStory(workflow),
  }));
}

export function serializeScanResult(result: ScanResult, scanId: string): SerializedScanResult {
  const seconds = Math.round(result.scanTimeSeconds * 100) / 100;
  return {
    scan_id: scanId,
    repository_path: result.repositoryPath,
    status: result.status,
    commit_hash: result.commitHash,
    files_scanned: result.filesScanned,
    total_files: result.totalFiles,
    ...serializeGraph(result.graph),
    workflows: serializeWorkflows(result.workflows),
    scan_time_seconds: seconds,
    scan_duration: seconds,
    errors: [...result.errors],
    warnings: [...result.warnings],
  };
}
