import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { WorkflowGraph } from '../core/graph.js';
import { createEdge, createNode, WorkflowType } from '../core/model.js';

/**
 * Create a throwaway repository under the OS temp dir. Keys are paths relative
 * to the root.
 */
export async function createRepo(files: Record<string, string | Buffer>): Promise<string> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'flowstory-'));
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(root, relative);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content);
  }
  return root;
}

export async function removeRepo(root: string): Promise<void> {
  await fs.rm(root, { recursive: true, force: true });
}

/**
 * Join lines with `\n` so tests can count line numbers from 1
 */
export function source(...lines: string[]): string {
  return lines.join('\n');
}

/**
 * Save-order workflow: a click in a.tsx calls an API that writes to Orders in
 * b.cs, with an unlabeled edge back to the trigger
 */
export function orderGraph(): WorkflowGraph {
  const graph = new WorkflowGraph();
  graph.addNode(
    createNode({
      id: 'a.tsx:ui_trigger:2',
      type: WorkflowType.DataTransform,
      name: 'UI: Click',
      description: 'User interaction in OrderForm',
      location: { filePath: 'a.tsx', lineNumber: 2 },
      metadata: {
        isUiTrigger: true,
        triggerType: 'ui_click',
        handler: 'handleSaveOrder',
        component: 'OrderForm',
      },
    })
  );
  graph.addNode(
    createNode({
      id: 'a.tsx:api:5',
      type: WorkflowType.ApiCall,
      name: 'API POST: /api/orders',
      description: 'HTTP API call from TypeScript',
      location: { filePath: 'a.tsx', lineNumber: 5 },
      endpoint: '/api/orders',
      method: 'POST',
    })
  );
  graph.addNode(
    createNode({
      id: 'b.cs:db_write:3',
      type: WorkflowType.DatabaseWrite,
      name: 'DB Write: Orders',
      description: 'Database write operation',
      location: { filePath: 'b.cs', lineNumber: 3 },
      tableName: 'Orders',
    })
  );
  graph.addEdge(createEdge('a.tsx:ui_trigger:2', 'a.tsx:api:5', 'User Action → API Call'));
  graph.addEdge(createEdge('a.tsx:api:5', 'b.cs:db_write:3', 'Data Ingestion'));
  graph.addEdge(createEdge('b.cs:db_write:3', 'a.tsx:ui_trigger:2'));
  return graph;
}
