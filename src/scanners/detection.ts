import { WorkflowGraph } from '../core/graph.js';
import { createNode, nodeId, type NodeInit } from '../core/model.js';
import type { SchemaRegistry } from '../core/schema-registry.js';
import type { DetectionToggle } from '../types.js';

/**
 * One pattern inside a detection category. `label` is recorded in node metadata.
 */
export interface DetectionRule {
  pattern: RegExp;
  label?: string;
}

/**
 * What an `emit` function sees for a matching line
 */
export interface LineMatch {
  filePath: string;
  content: string;
  lines: readonly string[];
  /** 1-based */
  lineNumber: number;
  line: string;
  match: RegExpExecArray;
  rule: DetectionRule;
  registry?: SchemaRegistry;
}

export type NodeDraft = Omit<NodeInit, 'id' | 'location' | 'codeSnippet'>;

/**
 * A declarative detection category: the scanner loop tests `rules` in order on
 * every line and emits at most one node per line for the category.
 */
export interface DetectionCategory {
  /** Middle segment of node ids, e.g. `db_read` */
  idSegment: string;
  /** Config toggle gating the category; always on when absent */
  toggle?: DetectionToggle;
  rules: readonly DetectionRule[];
  emit(match: LineMatch): NodeDraft | null;
}

export interface DetectionContext {
  filePath: string;
  content: string;
  registry?: SchemaRegistry;
  isEnabled(toggle: DetectionToggle): boolean;
  snippet(lineNumber: number): string;
}

/**
 * Run detection categories over a file and add the emitted nodes to `graph`.
 * Nodes come out in line order.
 */
export function runDetection(
  categories: readonly DetectionCategory[],
  context: DetectionContext,
  graph: WorkflowGraph = new WorkflowGraph()
): WorkflowGraph {
  const active = categories.filter((c) => !c.toggle || context.isEnabled(c.toggle));
  if (active.length === 0) return graph;

  const lines = context.content.split('\n');
  for (let index = 0; index < lines.length; index++) {
    const line = lines[index];
    const lineNumber = index + 1;

    for (const category of active) {
      for (const rule of category.rules) {
        const match = rule.pattern.exec(line);
        if (!match) continue;

        const draft = category.emit({
          filePath: context.filePath,
          content: context.content,
          lines,
          lineNumber,
          line,
          match,
          rule,
          registry: context.registry,
        });
        if (draft) {
          graph.addNode(
            createNode({
              ...draft,
              id: nodeId(context.filePath, category.idSegment, lineNumber),
              location: { filePath: context.filePath, lineNumber },
              codeSnippet: context.snippet(lineNumber),
            })
          );
        }
        break;
      }
    }
  }

  return graph;
}
