import * as path from 'path';
import type { WorkflowGraph } from '../core/graph.js';
import { WorkflowType, type WorkflowNode } from '../core/model.js';
import type {
  InteractionType,
  UIInteraction,
  UIWorkflow,
  WorkflowStep,
} from '../types.js';
import { BaseAnalyzer } from './base-analyzer.js';

const INTERACTION_KEYWORDS = [
  'onclick',
  'onsubmit',
  'button',
  'click',
  'submit',
  'handlesubmit',
  'handleclick',
  'onsave',
  'onload',
  'ondelete',
  'eventhandler',
  'handler',
  'command',
  'action',
];

const ICONS: Record<WorkflowType, string> = {
  [WorkflowType.DatabaseRead]: '📖',
  [WorkflowType.DatabaseWrite]: '💾',
  [WorkflowType.ApiCall]: '🌐',
  [WorkflowType.FileRead]: '📄',
  [WorkflowType.FileWrite]: '📝',
  [WorkflowType.MessageSend]: '📤',
  [WorkflowType.MessageReceive]: '📥',
  [WorkflowType.DataTransform]: '⚙️',
  [WorkflowType.CacheRead]: '🔍',
  [WorkflowType.CacheWrite]: '💿',
};

const UI_TRIGGER_ICON = '👆';

const TRIGGER_ACTIONS: Record<string, string> = {
  ui_click: 'clicks',
  ui_submit: 'submits a form',
  ui_change: 'changes a value',
  ui_keypress: 'presses a key',
  page_load: 'opens the page',
};

function stringMeta(node: WorkflowNode, key: string): string | undefined {
  const value = node.metadata[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function byLocation(a: WorkflowNode, b: WorkflowNode): number {
  if (a.location.filePath !== b.location.filePath) {
    return a.location.filePath < b.location.filePath ? -1 : 1;
  }
  return a.location.lineNumber - b.location.lineNumber;
}

function isUiTrigger(node: WorkflowNode): boolean {
  return node.metadata.isUiTrigger === true;
}

/**
 * `handleSaveOrder` → `Save Order`, `Save_Click` → `Save Click`
 */
export function humanizeName(name: string): string {
  return name
    .replace(/\b(?:handle|on)(?=[A-Z_])/g, '')
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .replace(/[_-]+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim()
    .split(' ')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

/**
 * Last two meaningful path segments of an endpoint: `/api/orders/{id}` → `Api Orders`
 */
export function humanizeEndpoint(endpoint: string | undefined): string {
  if (!endpoint) return 'service';
  const meaningful = endpoint
    .split('?')[0]
    .split('/')
    .filter((part) => part && !part.startsWith('{') && !part.startsWith('$') && !part.startsWith(':'));
  if (meaningful.length === 0) return 'service';
  return meaningful
    .slice(-2)
    .join(' ')
    .replace(/-/g, ' ')
    .split(' ')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

/**
 * Turns the workflow graph into user-facing workflows: one per UI entry point,
 * covering every node reachable from it
 */
export class WorkflowAnalyzer extends BaseAnalyzer {
  constructor(private readonly graph: WorkflowGraph) {
    super();
  }

  getName(): string {
    return 'WorkflowAnalyzer';
  }

  /**
   * Every workflow, trivial ones included
   */
  analyze(): UIWorkflow[] {
    const interactions = this.identifyInteractions();
    this.log(`Found ${interactions.length} UI interactions`);

    const workflows = interactions.map((interaction) => this.buildWorkflow(interaction));
    this.log(`Built ${workflows.filter((w) => !w.trivial).length} workflows with steps`);
    return workflows;
  }

  identifyInteractions(): UIInteraction[] {
    return this.graph.nodes.filter((node) => this.isEntryPoint(node)).map((node) => this.toInteraction(node));
  }

  buildWorkflow(interaction: UIInteraction): UIWorkflow {
    const reachable = this.reachableFrom(interaction.node.id).sort(byLocation);
    const steps = reachable.map((node, index) => this.toStep(node, index + 1));

    return {
      id: `workflow_${interaction.id}`,
      name: interaction.name,
      trigger: interaction,
      steps,
      summary: summarize(steps),
      outcome: outcomeOf(steps),
      trivial: steps.length === 0,
    };
  }

  private isEntryPoint(node: WorkflowNode): boolean {
    if (isUiTrigger(node)) return true;
    const name = node.name.toLowerCase();
    return INTERACTION_KEYWORDS.some((keyword) => name.includes(keyword));
  }

  private toInteraction(node: WorkflowNode): UIInteraction {
    const handler = stringMeta(node, 'handler');
    const name = humanizeName(handler ?? node.name);
    const keywords = `${node.name} ${handler ?? ''}`.toLowerCase();
    const triggerType = stringMeta(node, 'triggerType');

    let interactionType: InteractionType;
    let description: string;
    if (triggerType === 'ui_submit' || keywords.includes('submit')) {
      interactionType = 'form_submit';
      description = `User submits ${name}`;
    } else if (keywords.includes('save')) {
      interactionType = 'button_click';
      description = `User clicks ${name}`;
    } else if (triggerType === 'page_load' || keywords.includes('load')) {
      interactionType = 'page_load';
      description = `User navigates to ${name}`;
    } else if (keywords.includes('delete')) {
      interactionType = 'button_click';
      description = `User clicks ${name}`;
    } else {
      interactionType = 'button_click';
      description = `User interacts with ${name}`;
    }

    return {
      id: node.id,
      name,
      component:
        stringMeta(node, 'component') ??
        stringMeta(node, 'window') ??
        path.parse(node.location.filePath).name,
      interactionType,
      location: node.location.filePath,
      description,
      node,
    };
  }

  /**
   * Breadth-first over outgoing edges; each id is visited once, so cycles
   * terminate. Includes the start node when it is in the graph.
   */
  private reachableFrom(startId: string): WorkflowNode[] {
    const start = this.graph.getNode(startId);
    if (!start) return [];

    const visited = new Set<string>([start.id]);
    const reachable: WorkflowNode[] = [];
    const queue: WorkflowNode[] = [start];

    for (let head = 0; head < queue.length; head++) {
      const current = queue[head];
      reachable.push(current);
      for (const edge of this.graph.getOutgoingEdges(current.id)) {
        if (visited.has(edge.target)) continue;
        const target = this.graph.getNode(edge.target);
        if (!target) continue;
        visited.add(target.id);
        queue.push(target);
      }
    }
    return reachable;
  }

  private toStep(node: WorkflowNode, stepNumber: number): WorkflowStep {
    const { title, description, technicalDetails } = describeNode(node);
    return {
      stepNumber,
      title,
      description,
      technicalDetails,
      node,
      icon: isUiTrigger(node) ? UI_TRIGGER_ICON : (ICONS[node.type] ?? '•'),
    };
  }
}

function describeNode(node: WorkflowNode): Pick<WorkflowStep, 'title' | 'description' | 'technicalDetails'> {
  if (isUiTrigger(node)) {
    const owner = stringMeta(node, 'component') ?? stringMeta(node, 'window') ?? 'the interface';
    const triggerType = stringMeta(node, 'triggerType') ?? 'ui_click';
    const handler = stringMeta(node, 'handler') ?? 'unknown';
    return {
      title: `User ${TRIGGER_ACTIONS[triggerType] ?? 'interacts'} in ${owner}`,
      description: `The user starts this workflow from ${owner}.`,
      technicalDetails: `UI trigger ${triggerType}: ${handler}`,
    };
  }

  const table = node.tableName ?? 'database';
  switch (node.type) {
    case WorkflowType.DatabaseWrite:
      return {
        title: `Save data to ${table}`,
        description: `The system saves the information to the ${table} table.`,
        technicalDetails: `Database INSERT/UPDATE: ${node.tableName ?? 'unknown'}`,
      };
    case WorkflowType.DatabaseRead:
      return {
        title: `Retrieve data from ${table}`,
        description: `The system looks up existing information from the ${table} table.`,
        technicalDetails: `Database SELECT: ${node.tableName ?? 'unknown'}`,
      };
    case WorkflowType.ApiCall:
      return {
        title: `Call ${node.method ?? 'API'} ${humanizeEndpoint(node.endpoint)}`,
        description: `The system communicates with an external service at ${node.endpoint ?? 'an external endpoint'}.`,
        technicalDetails: `API ${node.method ?? 'HTTP'}: ${node.endpoint ?? 'unknown'}`,
      };
    case WorkflowType.DataTransform:
      return {
        title: 'Process and transform data',
        description: 'The system transforms the data into the required format.',
        technicalDetails: `Data transformation: ${node.name}`,
      };
    case WorkflowType.FileWrite:
      return {
        title: 'Write to file',
        description: 'The system saves information to a file.',
        technicalDetails: `File write: ${node.filePath ?? 'unknown'}`,
      };
    case WorkflowType.FileRead:
      return {
        title: 'Read from file',
        description: 'The system reads information from a file.',
        technicalDetails: `File read: ${node.filePath ?? 'unknown'}`,
      };
    default:
      return {
        title: humanizeName(node.name),
        description: node.description || 'The system performs an operation.',
        technicalDetails: `${node.type}: ${node.name}`,
      };
  }
}

function summarize(steps: readonly WorkflowStep[]): string {
  if (steps.length === 0) return 'This workflow performs a simple operation.';

  const count = (type: WorkflowType): number => steps.filter((s) => s.node.type === type).length;
  const reads = count(WorkflowType.DatabaseRead);
  const calls = count(WorkflowType.ApiCall);
  const writes = count(WorkflowType.DatabaseWrite);

  const parts: string[] = [];
  if (reads > 0) parts.push(`retrieves data from ${reads} database table(s)`);
  if (calls > 0) parts.push(`calls ${calls} external service(s)`);
  if (writes > 0) parts.push(`saves data to ${writes} database table(s)`);

  if (parts.length > 0) return `This workflow ${parts.join(', then ')}.`;
  return `This workflow performs ${steps.length} operation(s).`;
}

function outcomeOf(steps: readonly WorkflowStep[]): string {
  const last = steps[steps.length - 1];
  if (!last) return 'The action completes.';

  switch (last.node.type) {
    case WorkflowType.DatabaseWrite:
      return 'The data is saved and the user sees a success confirmation.';
    case WorkflowType.DatabaseRead:
      return 'The data is retrieved and displayed to the user.';
    case WorkflowType.ApiCall:
      return 'The external service responds and the result is shown to the user.';
    default:
      return 'The action completes and the user sees the result.';
  }
}

/**
 * Markdown narrative of a workflow
 */
export function toStory(workflow: UIWorkflow): string {
  const lines = [
    `# ${workflow.name}`,
    '',
    `**What happens:** ${workflow.summary}`,
    '',
    `**User action:** ${workflow.trigger.description}`,
    '',
    '## Workflow Steps',
  ];

  for (const step of workflow.steps) {
    lines.push(
      '',
      `${step.icon} **Step ${step.stepNumber}: ${step.title}**`,
      step.description,
      `_Technical: ${step.technicalDetails}_`
    );
  }

  lines.push('', `**Result:** ${workflow.outcome}`, '');
  return lines.join('\n');
}

/**
 * Analyze every UI entry point of `graph`
 */
export function analyzeWorkflows(graph: WorkflowGraph): UIWorkflow[] {
  return new WorkflowAnalyzer(graph).analyze();
}
