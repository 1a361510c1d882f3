import type { WorkflowEdge, WorkflowNode, WorkflowType } from './model.js';

function edgeKey(source: string, target: string): string {
  return `${source}\u0000${target}`;
}

/**
 * Workflow graph with insertion-ordered nodes and edges.
 *
 * Adds are set-like: a node is skipped when its id is already present, an edge
 * when its (source, target) pair is. The first edge for a pair keeps its label.
 * Lookups go through indexes but return what a linear scan over the ordered
 * collections would.
 */
export class WorkflowGraph {
  private readonly nodeList: WorkflowNode[] = [];
  private readonly edgeList: WorkflowEdge[] = [];
  private readonly nodesById = new Map<string, WorkflowNode>();
  private readonly nodesByType = new Map<WorkflowType, WorkflowNode[]>();
  private readonly edgeKeys = new Set<string>();
  private readonly outgoing = new Map<string, WorkflowEdge[]>();
  private readonly incoming = new Map<string, WorkflowEdge[]>();

  get nodes(): readonly WorkflowNode[] {
    return this.nodeList;
  }

  get edges(): readonly WorkflowEdge[] {
    return this.edgeList;
  }

  addNode(node: WorkflowNode): boolean {
    if (this.nodesById.has(node.id)) return false;

    this.nodeList.push(node);
    this.nodesById.set(node.id, node);
    const byType = this.nodesByType.get(node.type);
    if (byType) {
      byType.push(node);
    } else {
      this.nodesByType.set(node.type, [node]);
    }
    return true;
  }

  addEdge(edge: WorkflowEdge): boolean {
    const key = edgeKey(edge.source, edge.target);
    if (this.edgeKeys.has(key)) return false;

    this.edgeKeys.add(key);
    this.edgeList.push(edge);
    pushTo(this.outgoing, edge.source, edge);
    pushTo(this.incoming, edge.target, edge);
    return true;
  }

  hasEdge(source: string, target: string): boolean {
    return this.edgeKeys.has(edgeKey(source, target));
  }

  getNode(id: string): WorkflowNode | undefined {
    return this.nodesById.get(id);
  }

  getNodesByType(type: WorkflowType): WorkflowNode[] {
    return [...(this.nodesByType.get(type) ?? [])];
  }

  getOutgoingEdges(nodeId: string): WorkflowEdge[] {
    return [...(this.outgoing.get(nodeId) ?? [])];
  }

  getIncomingEdges(nodeId: string): WorkflowEdge[] {
    return [...(this.incoming.get(nodeId) ?? [])];
  }

  /**
   * Merge a fragment into this graph. Nodes are shared by reference.
   */
  merge(fragment: WorkflowGraph): { nodesAdded: number; edgesAdded: number } {
    let nodesAdded = 0;
    let edgesAdded = 0;
    for (const node of fragment.nodes) {
      if (this.addNode(node)) nodesAdded++;
    }
    for (const edge of fragment.edges) {
      if (this.addEdge(edge)) edgesAdded++;
    }
    return { nodesAdded, edgesAdded };
  }
}

function pushTo<K, V>(map: Map<K, V[]>, key: K, value: V): void {
  const list = map.get(key);
  if (list) {
    list.push(value);
  } else {
    map.set(key, [value]);
  }
}
