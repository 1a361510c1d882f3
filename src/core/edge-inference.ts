import type { EdgeInferenceConfig } from '../types.js';
import { createLogger } from '../utils/logger.js';
import type { WorkflowGraph } from './graph.js';
import { createEdge, WorkflowType, type WorkflowNode } from './model.js';

export interface EdgeInferenceStats {
  proximity: number;
  ingestion: number;
  processing: number;
}

interface DataFlowPattern {
  from: WorkflowType;
  to: WorkflowType;
  window: (config: EdgeInferenceConfig) => number;
  label: string;
  pattern: string;
  stat: 'ingestion' | 'processing';
}

const DATA_FLOW_PATTERNS: readonly DataFlowPattern[] = [
  {
    from: WorkflowType.ApiCall,
    to: WorkflowType.DatabaseWrite,
    window: (config) => config.ingestionWindow,
    label: 'Data Ingestion',
    pattern: 'api_to_db',
    stat: 'ingestion',
  },
  {
    from: WorkflowType.DatabaseRead,
    to: WorkflowType.DataTransform,
    window: (config) => config.processingWindow,
    label: 'Data Processing',
    pattern: 'db_to_transform',
    stat: 'processing',
  },
];

const byLine = (a: WorkflowNode, b: WorkflowNode): number =>
  a.location.lineNumber - b.location.lineNumber;

/**
 * Index of the first node whose line is greater than `line` (nodes sorted by line)
 */
export function firstAfter(sorted: readonly WorkflowNode[], line: number): number {
  let low = 0;
  let high = sorted.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (sorted[mid].location.lineNumber <= line) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return low;
}

function groupByFile(nodes: readonly WorkflowNode[]): Map<string, WorkflowNode[]> {
  const groups = new Map<string, WorkflowNode[]>();
  for (const node of nodes) {
    const list = groups.get(node.location.filePath);
    if (list) {
      list.push(node);
    } else {
      groups.set(node.location.filePath, [node]);
    }
  }
  return groups;
}

/**
 * Adds inferred edges between nodes of the same file: sequential proximity
 * edges and data-flow edges. Running it twice adds nothing the second time.
 */
export class EdgeInferenceEngine {
  private readonly logger = createLogger('EdgeInference');

  constructor(private readonly config: EdgeInferenceConfig) {}

  infer(graph: WorkflowGraph): EdgeInferenceStats {
    const stats: EdgeInferenceStats = { proximity: 0, ingestion: 0, processing: 0 };
    if (!this.config.enabled) return stats;

    const files = groupByFile(graph.nodes);
    if (this.config.proximityEdges) {
      stats.proximity = this.inferProximity(graph, files);
      this.logger.log(`Added ${stats.proximity} proximity edges`);
    }
    if (this.config.dataFlowEdges) {
      for (const pattern of DATA_FLOW_PATTERNS) {
        stats[pattern.stat] += this.inferDataFlow(graph, files, pattern);
      }
      this.logger.log(
        `Added ${stats.ingestion} data ingestion and ${stats.processing} data processing edges`
      );
    }
    return stats;
  }

  /**
   * Link each node to its successor in line order when the gap is within
   * `maxLineDistance`
   */
  private inferProximity(graph: WorkflowGraph, files: Map<string, WorkflowNode[]>): number {
    let added = 0;
    for (const nodes of files.values()) {
      const sorted = [...nodes].sort(byLine);
      for (let i = 0; i < sorted.length - 1; i++) {
        const current = sorted[i];
        const next = sorted[i + 1];
        const distance = next.location.lineNumber - current.location.lineNumber;
        if (distance > this.config.maxLineDistance) continue;

        const edge = createEdge(current.id, next.id, `Sequential (${distance} lines)`, { distance });
        if (graph.addEdge(edge)) added++;
      }
    }
    return added;
  }

  /**
   * For each `from` node, link every `to` node strictly after it and less than
   * the pattern window away
   */
  private inferDataFlow(
    graph: WorkflowGraph,
    files: Map<string, WorkflowNode[]>,
    pattern: DataFlowPattern
  ): number {
    const window = pattern.window(this.config);
    let added = 0;

    for (const nodes of files.values()) {
      const sources = nodes.filter((node) => node.type === pattern.from);
      if (sources.length === 0) continue;
      const targets = nodes
        .filter((node) => node.type === pattern.to && node.metadata.isUiTrigger !== true)
        .sort(byLine);
      if (targets.length === 0) continue;

      for (const source of sources) {
        const line = source.location.lineNumber;
        for (let i = firstAfter(targets, line); i < targets.length; i++) {
          const target = targets[i];
          if (target.location.lineNumber - line >= window) break;
          if (graph.hasEdge(source.id, target.id)) continue;

          graph.addEdge(createEdge(source.id, target.id, pattern.label, { pattern: pattern.pattern }));
          added++;
        }
      }
    }
    return added;
  }
}
