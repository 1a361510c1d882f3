import type { WorkflowGraph } from '../core/graph.js';
import { WorkflowType } from '../core/model.js';
import type { SchemaRegistry } from '../core/schema-registry.js';
import { TypeScriptScanner } from './typescript-scanner.js';
import { cleanHandler, detectTriggers, fileStem, linkCalls, type TriggerRule } from './ui-triggers.js';

const EVENT_RULES: readonly TriggerRule[] = [
  { pattern: /onClick\s*=\s*\{([^}]+)\}/, triggerType: 'ui_click' },
  { pattern: /onSubmit\s*=\s*\{([^}]+)\}/, triggerType: 'ui_submit' },
  { pattern: /onChange\s*=\s*\{([^}]+)\}/, triggerType: 'ui_change' },
  { pattern: /onLoad\s*=\s*\{([^}]+)\}/, triggerType: 'page_load' },
];

const COMPONENT_PATTERNS = [
  /export\s+(?:default\s+)?(?:function|const)\s+(\w+)/,
  /const\s+(\w+)\s*[=:]\s*\([^)]*\)\s*(?:=>|:)/,
  /function\s+(\w+)\s*\([^)]*\)/,
];

const ROUTE_PATTERNS = [
  /<Route\s+path\s*=\s*['"]([^'"]+)['"]/,
  /path\s*:\s*['"]([^'"]+)['"]/,
  /href\s*=\s*['"]([^'"]+)['"]/,
];

/** Max line distance between a trigger and the calls it starts */
const TRIGGER_WINDOW = 50;

export function detectComponentName(filePath: string, content: string): string {
  for (const pattern of COMPONENT_PATTERNS) {
    const match = pattern.exec(content);
    if (match) return match[1];
  }
  return fileStem(filePath);
}

export function detectRoute(content: string): string | undefined {
  for (const pattern of ROUTE_PATTERNS) {
    const match = pattern.exec(content);
    if (match) return match[1];
  }
  return undefined;
}

/**
 * Scanner for React components (.tsx/.jsx). Runs the TypeScript detections,
 * then adds JSX event triggers linked to nearby API calls.
 */
export class ReactScanner extends TypeScriptScanner {
  getName(): string {
    return 'ReactScanner';
  }

  canScan(filePath: string): boolean {
    return filePath.endsWith('.tsx') || filePath.endsWith('.jsx');
  }

  async scanFile(filePath: string, registry?: SchemaRegistry): Promise<WorkflowGraph> {
    const content = await this.readFile(filePath);
    const graph = this.scanContent(filePath, content, registry);
    const lines = content.split('\n');

    const component = detectComponentName(filePath, content);
    const url = detectRoute(content);
    const triggers = detectTriggers(
      EVENT_RULES,
      {
        filePath,
        content,
        framework: 'React',
        ownerKey: 'component',
        owner: component,
        url,
        cleanHandler,
        snippet: (lineNumber) => this.extractCodeSnippet(lines, lineNumber),
      },
      graph
    );

    const calls = graph.getNodesByType(WorkflowType.ApiCall);
    for (const trigger of triggers) {
      linkCalls(
        graph,
        trigger,
        calls,
        (call) => Math.abs(call.location.lineNumber - trigger.lineNumber) <= TRIGGER_WINDOW,
        'User Action → API Call',
        { workflowType: 'ui_to_api', url }
      );
    }

    this.log(`${filePath}: ${component}, ${triggers.length} triggers, ${calls.length} calls`);
    return graph;
  }
}
