import type { SerializedGraph, SerializedWorkflow } from '../core/serialize.js';

export interface MermaidDiagram {
  type: 'flowchart';
  title: string;
  content: string;
}

const MAX_EDGES = 30;

const TYPE_CLASSES: Record<string, string> = {
  database_read: 'database',
  database_write: 'database',
  api_call: 'api',
  file_read: 'file',
  file_write: 'file',
  message_send: 'message',
  message_receive: 'message',
  cache_read: 'database',
  cache_write: 'database',
  data_transform: 'transform',
};

/**
 * Text safe inside a quoted Mermaid label
 */
export function escapeLabel(text: string): string {
  return text.replace(/"/g, '#quot;').replace(/\|/g, '#124;').replace(/\n/g, ' ');
}

/**
 * Mermaid diagram generator
 */
export class MermaidGenerator {
  /**
   * Flowchart of one workflow: a node per step, the graph edges between steps
   */
  generateWorkflowDiagram(workflow: SerializedWorkflow, graph: SerializedGraph): MermaidDiagram {
    const lines: string[] = ['flowchart TD', `  %% ${escapeLabel(workflow.name)}`];

    const stepIds = new Map<string, string>();
    for (const step of workflow.steps) {
      const id = `S${step.step_number}`;
      stepIds.set(step.node_id, id);
      lines.push(`  ${id}["${escapeLabel(`${step.icon} ${step.title}`)}"]`);
    }

    let edgeCount = 0;
    for (const edge of graph.edges) {
      if (edgeCount >= MAX_EDGES) break;
      const source = stepIds.get(edge.source);
      const target = stepIds.get(edge.target);
      if (!source || !target || source === target) continue;
      lines.push(
        edge.label
          ? `  ${source} -->|"${escapeLabel(edge.label)}"| ${target}`
          : `  ${source} --> ${target}`
      );
      edgeCount++;
    }

    const nodeTypes = new Map(graph.nodes.map((node) => [node.id, node] as const));
    const classAssignments: string[] = [];
    for (const [nodeId, id] of stepIds) {
      const node = nodeTypes.get(nodeId);
      if (!node) continue;
      const cls = node.metadata.is_ui_trigger === true ? 'trigger' : TYPE_CLASSES[node.type];
      if (cls) classAssignments.push(`  class ${id} ${cls}`);
    }

    if (classAssignments.length > 0) {
      lines.push(
        '',
        '  classDef trigger fill:#e0e7ff,stroke:#6366f1,color:#312e81',
        '  classDef database fill:#dcfce7,stroke:#22c55e,color:#166534',
        '  classDef api fill:#fef3c7,stroke:#f59e0b,color:#92400e',
        '  classDef file fill:#f3f4f6,stroke:#6b7280,color:#374151',
        '  classDef message fill:#fce7f3,stroke:#ec4899,color:#9d174d',
        '  classDef transform fill:#e0f2fe,stroke:#0ea5e9,color:#075985',
        ...classAssignments
      );
    }

    return {
      type: 'flowchart',
      title: workflow.name,
      content: lines.join('\n'),
    };
  }
}
