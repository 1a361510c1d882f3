import { describe, it, expect } from 'vitest';
import { DEFAULT_SCAN_CONFIG } from '../config/config-loader.js';
import { EdgeInferenceEngine, firstAfter } from '../core/edge-inference.js';
import { WorkflowGraph } from '../core/graph.js';
import { createNode, nodeId, WorkflowType, type WorkflowNode } from '../core/model.js';
import type { EdgeInferenceConfig } from '../types.js';

function makeNode(
  file: string,
  line: number,
  type: WorkflowType,
  metadata: Record<string, unknown> = {}
): WorkflowNode {
  return createNode({
    id: nodeId(file, type, line),
    type,
    name: `${type} at ${line}`,
    description: '',
    location: { filePath: file, lineNumber: line },
    metadata,
  });
}

function graphOf(...nodes: WorkflowNode[]): WorkflowGraph {
  const graph = new WorkflowGraph();
  for (const node of nodes) graph.addNode(node);
  return graph;
}

function engine(overrides: Partial<EdgeInferenceConfig> = {}): EdgeInferenceEngine {
  return new EdgeInferenceEngine({ ...DEFAULT_SCAN_CONFIG.scanner.edgeInference, ...overrides });
}

describe('EdgeInferenceEngine', () => {
  describe('proximity edges', () => {
    it('should link successive nodes within the line distance', () => {
      const a = makeNode('a.cs', 10, WorkflowType.DatabaseRead);
      const b = makeNode('a.cs', 25, WorkflowType.FileRead);
      const c = makeNode('a.cs', 50, WorkflowType.FileWrite);
      const graph = graphOf(c, a, b);

      const stats = engine({ dataFlowEdges: false }).infer(graph);

      expect(stats).toEqual({ proximity: 1, ingestion: 0, processing: 0 });
      expect(graph.edges).toEqual([
        { source: a.id, target: b.id, label: 'Sequential (15 lines)', metadata: { distance: 15 } },
      ]);
    });

    it('should link nodes exactly at the line distance', () => {
      const a = makeNode('a.cs', 1, WorkflowType.DatabaseRead);
      const b = makeNode('a.cs', 21, WorkflowType.FileRead);
      const graph = graphOf(a, b);

      engine({ dataFlowEdges: false }).infer(graph);

      expect(graph.edges.map((edge) => edge.label)).toEqual(['Sequential (20 lines)']);
    });

    it('should never link nodes of different files', () => {
      const graph = graphOf(
        makeNode('a.cs', 1, WorkflowType.ApiCall),
        makeNode('b.cs', 2, WorkflowType.DatabaseWrite),
        makeNode('c.ts', 3, WorkflowType.DatabaseRead),
        makeNode('d.ts', 4, WorkflowType.DataTransform)
      );

      expect(engine().infer(graph)).toEqual({ proximity: 0, ingestion: 0, processing: 0 });
      expect(graph.edges).toEqual([]);
    });
  });

  describe('data-flow edges', () => {
    it('should link an API call to later writes inside the ingestion window', () => {
      const call = makeNode('a.cs', 10, WorkflowType.ApiCall);
      const near = makeNode('a.cs', 30, WorkflowType.DatabaseWrite);
      const edge = makeNode('a.cs', 60, WorkflowType.DatabaseWrite);
      const before = makeNode('a.cs', 5, WorkflowType.DatabaseWrite);
      const graph = graphOf(call, near, edge, before);

      const stats = engine({ proximityEdges: false }).infer(graph);

      expect(stats.ingestion).toBe(1);
      expect(graph.edges).toEqual([
        { source: call.id, target: near.id, label: 'Data Ingestion', metadata: { pattern: 'api_to_db' } },
      ]);
    });

    it('should link a read to later transforms but not to UI triggers', () => {
      const read = makeNode('a.ts', 5, WorkflowType.DatabaseRead);
      const trigger = makeNode('a.ts', 10, WorkflowType.DataTransform, { isUiTrigger: true });
      const transform = makeNode('a.ts', 20, WorkflowType.DataTransform);
      const graph = graphOf(read, trigger, transform);

      const stats = engine({ proximityEdges: false }).infer(graph);

      expect(stats.processing).toBe(1);
      expect(graph.edges).toEqual([
        {
          source: read.id,
          target: transform.id,
          label: 'Data Processing',
          metadata: { pattern: 'db_to_transform' },
        },
      ]);
    });

    it('should not relabel a pair already joined by a proximity edge', () => {
      const call = makeNode('a.cs', 3, WorkflowType.ApiCall);
      const write = makeNode('a.cs', 4, WorkflowType.DatabaseWrite);
      const graph = graphOf(call, write);

      const stats = engine().infer(graph);

      expect(stats).toEqual({ proximity: 1, ingestion: 0, processing: 0 });
      expect(graph.edges.map((edge) => edge.label)).toEqual(['Sequential (1 lines)']);
    });
  });

  it('should add nothing on a second run', () => {
    const graph = graphOf(
      makeNode('a.cs', 2, WorkflowType.ApiCall),
      makeNode('a.cs', 4, WorkflowType.FileRead),
      makeNode('a.cs', 6, WorkflowType.DatabaseWrite)
    );
    const inference = engine();

    expect(inference.infer(graph)).toEqual({ proximity: 2, ingestion: 1, processing: 0 });
    expect(inference.infer(graph)).toEqual({ proximity: 0, ingestion: 0, processing: 0 });
    expect(graph.edges).toHaveLength(3);
  });

  it('should do nothing when disabled', () => {
    const graph = graphOf(makeNode('a.cs', 1, WorkflowType.ApiCall), makeNode('a.cs', 2, WorkflowType.DatabaseWrite));

    expect(engine({ enabled: false }).infer(graph)).toEqual({ proximity: 0, ingestion: 0, processing: 0 });
    expect(graph.edges).toEqual([]);
  });
});

describe('firstAfter', () => {
  const sorted = [5, 10, 10, 20].map((line) => makeNode('a.ts', line, WorkflowType.DataTransform));

  it('should return the index of the first line greater than the given one', () => {
    expect(firstAfter(sorted, 0)).toBe(0);
    expect(firstAfter(sorted, 5)).toBe(1);
    expect(firstAfter(sorted, 10)).toBe(3);
    expect(firstAfter(sorted, 20)).toBe(4);
  });
});
