import { WorkflowGraph } from '../core/graph.js';
import { WorkflowType } from '../core/model.js';
import type { SchemaRegistry } from '../core/schema-registry.js';
import type { DetectionToggles } from '../types.js';
import { BaseScanner } from './base-scanner.js';
import { CSharpScanner } from './csharp-scanner.js';
import { detectTriggers, fileStem, linkCalls, type TriggerRule } from './ui-triggers.js';

const XAML_EVENT_RULES: readonly TriggerRule[] = [
  { pattern: /Click\s*=\s*"([^"]+)"/, triggerType: 'ui_click' },
  { pattern: /MouseDown\s*=\s*"([^"]+)"/, triggerType: 'ui_click' },
  { pattern: /MouseUp\s*=\s*"([^"]+)"/, triggerType: 'ui_click' },
  { pattern: /SelectionChanged\s*=\s*"([^"]+)"/, triggerType: 'ui_change' },
  { pattern: /TextChanged\s*=\s*"([^"]+)"/, triggerType: 'ui_change' },
  { pattern: /KeyDown\s*=\s*"([^"]+)"/, triggerType: 'ui_keypress' },
  { pattern: /KeyUp\s*=\s*"([^"]+)"/, triggerType: 'ui_keypress' },
  { pattern: /Loaded\s*=\s*"([^"]+)"/, triggerType: 'page_load' },
];

const HANDLER_METHOD_PATTERN =
  /(?:private|protected|public|internal)\s+(?:async\s+)?void\s+(\w+)\s*\(\s*object\??\s+sender\s*,\s*\w*EventArgs\s+\w+\s*\)/;

const WINDOW_PATTERNS = [
  /<Window\s+x:Class\s*=\s*"([^"]+)"/,
  /<Page\s+x:Class\s*=\s*"([^"]+)"/,
  /<UserControl\s+x:Class\s*=\s*"([^"]+)"/,
  /public\s+partial\s+class\s+(\w+)\s*:\s*(?:Window|Page|UserControl)/,
];

/** Max line distance from a handler method to the calls it makes */
const HANDLER_WINDOW = 50;

/**
 * Window/page class name from XAML or code-behind (namespace dropped), else
 * the file name
 */
export function detectWindowName(filePath: string, ...sources: Array<string | null>): string {
  for (const content of sources) {
    if (!content) continue;
    for (const pattern of WINDOW_PATTERNS) {
      const match = pattern.exec(content);
      if (match) {
        const parts = match[1].split('.');
        return parts[parts.length - 1];
      }
    }
  }
  return fileStem(filePath);
}

/**
 * Event handler methods in code-behind, by name → 1-based line
 */
export function findHandlerMethods(content: string): Map<string, number> {
  const handlers = new Map<string, number>();
  content.split('\n').forEach((line, index) => {
    const match = HANDLER_METHOD_PATTERN.exec(line);
    if (match && !handlers.has(match[1])) {
      handlers.set(match[1], index + 1);
    }
  });
  return handlers;
}

/**
 * Scanner for WPF views. `X.xaml` and `X.xaml.cs` are scanned as a pair from
 * either side, so both produce the same node ids.
 */
export class WpfScanner extends BaseScanner {
  private readonly csharp: CSharpScanner;

  constructor(detect: Partial<DetectionToggles> = {}) {
    super(detect);
    this.csharp = new CSharpScanner(detect);
  }

  getName(): string {
    return 'WpfScanner';
  }

  canScan(filePath: string): boolean {
    return filePath.endsWith('.xaml') || filePath.endsWith('.xaml.cs');
  }

  async scanFile(filePath: string, registry?: SchemaRegistry): Promise<WorkflowGraph> {
    const isXaml = filePath.endsWith('.xaml');
    const xamlPath = isXaml ? filePath : filePath.slice(0, -'.cs'.length);
    const codeBehindPath = `${xamlPath}.cs`;

    const content = await this.readFile(filePath);
    const xaml = isXaml ? content : await this.readCompanion(xamlPath);
    const codeBehind = isXaml ? await this.readCompanion(codeBehindPath) : content;

    return this.scanPair(xamlPath, xaml, codeBehindPath, codeBehind, registry);
  }

  private scanPair(
    xamlPath: string,
    xaml: string | null,
    codeBehindPath: string,
    codeBehind: string | null,
    registry?: SchemaRegistry
  ): WorkflowGraph {
    const graph = new WorkflowGraph();
    if (codeBehind !== null) {
      this.csharp.scanContent(codeBehindPath, codeBehind, registry, graph);
    }
    if (xaml === null) return graph;

    const window = detectWindowName(xamlPath, xaml, codeBehind);
    const lines = xaml.split('\n');
    const triggers = detectTriggers(
      XAML_EVENT_RULES,
      {
        filePath: xamlPath,
        content: xaml,
        framework: 'WPF',
        ownerKey: 'window',
        owner: window,
        snippet: (lineNumber) => this.extractCodeSnippet(lines, lineNumber),
      },
      graph
    );

    const handlers = codeBehind !== null ? findHandlerMethods(codeBehind) : new Map<string, number>();
    const calls = graph.getNodesByType(WorkflowType.ApiCall);

    for (const trigger of triggers) {
      const handlerLine = handlers.get(trigger.handler);
      const metadata = { handler: trigger.handler, framework: 'WPF' };
      if (handlerLine !== undefined) {
        linkCalls(
          graph,
          trigger,
          calls,
          (call) =>
            call.location.lineNumber >= handlerLine &&
            call.location.lineNumber - handlerLine <= HANDLER_WINDOW,
          'WPF Event → HTTP Call',
          { workflowType: 'wpf_ui_to_api', ...metadata }
        );
      } else {
        linkCalls(graph, trigger, calls, () => true, 'WPF Event → HTTP Call (proximity)', {
          workflowType: 'wpf_ui_to_api_proximity',
          ...metadata,
        });
      }
    }

    this.log(`${xamlPath}: ${window}, ${triggers.length} triggers, ${handlers.size} handlers`);
    return graph;
  }
}
