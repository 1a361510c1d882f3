/**
 * Value types for the workflow graph
 */

/**
 * Kinds of runtime behavior a scanner can detect
 */
export const WorkflowType = {
  DatabaseRead: 'database_read',
  DatabaseWrite: 'database_write',
  ApiCall: 'api_call',
  FileRead: 'file_read',
  FileWrite: 'file_write',
  MessageSend: 'message_send',
  MessageReceive: 'message_receive',
  DataTransform: 'data_transform',
  CacheRead: 'cache_read',
  CacheWrite: 'cache_write',
} as const;

export type WorkflowType = (typeof WorkflowType)[keyof typeof WorkflowType];

export interface CodeLocation {
  readonly filePath: string;
  /** 1-based */
  readonly lineNumber: number;
  readonly column?: number;
  readonly endLine?: number;
}

export type NodeMetadata = Readonly<Record<string, unknown>>;

/**
 * A single detected operation
 */
export interface WorkflowNode {
  /** `{filePath}:{category}:{lineNumber}` */
  readonly id: string;
  readonly type: WorkflowType;
  readonly name: string;
  readonly description: string;
  readonly location: CodeLocation;
  readonly metadata: NodeMetadata;
  readonly codeSnippet?: string;

  // Database operations
  readonly tableName?: string;
  readonly query?: string;

  // API calls
  readonly endpoint?: string;
  readonly method?: string;

  // File operations
  readonly filePath?: string;

  // Message queues
  readonly queueName?: string;
  readonly topic?: string;
}

/**
 * Directed relationship between two nodes, identified by (source, target)
 */
export interface WorkflowEdge {
  readonly source: string;
  readonly target: string;
  readonly label?: string;
  readonly metadata: NodeMetadata;
}

export type NodeInit = Omit<WorkflowNode, 'metadata'> & { metadata?: Record<string, unknown> };

/**
 * Create a frozen node; location and metadata are copied so the caller's
 * objects can be reused.
 */
export function createNode(init: NodeInit): WorkflowNode {
  return Object.freeze({
    ...init,
    location: Object.freeze({ ...init.location }),
    metadata: Object.freeze({ ...(init.metadata ?? {}) }),
  });
}

export function createEdge(
  source: string,
  target: string,
  label?: string,
  metadata: Record<string, unknown> = {}
): WorkflowEdge {
  return Object.freeze({
    source,
    target,
    ...(label !== undefined ? { label } : {}),
    metadata: Object.freeze({ ...metadata }),
  });
}

export function formatLocation(location: CodeLocation): string {
  return `${location.filePath}:${location.lineNumber}`;
}

export function nodeId(filePath: string, category: string, lineNumber: number): string {
  return `${filePath}:${category}:${lineNumber}`;
}
