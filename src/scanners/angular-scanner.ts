import * as path from 'path';
import { WorkflowGraph } from '../core/graph.js';
import { WorkflowType } from '../core/model.js';
import type { SchemaRegistry } from '../core/schema-registry.js';
import { TypeScriptScanner } from './typescript-scanner.js';
import {
  cleanHandler,
  detectTriggers,
  fileStem,
  linkCalls,
  titleCase,
  type TriggerRule,
  type UiTrigger,
} from './ui-triggers.js';

const EVENT_RULES: readonly TriggerRule[] = [
  { pattern: /\(click\)\s*=\s*"([^"]+)"/, triggerType: 'ui_click' },
  { pattern: /\(submit\)\s*=\s*"([^"]+)"/, triggerType: 'ui_submit' },
  { pattern: /\(ngSubmit\)\s*=\s*"([^"]+)"/, triggerType: 'ui_submit' },
  { pattern: /\(change\)\s*=\s*"([^"]+)"/, triggerType: 'ui_change' },
  { pattern: /\(input\)\s*=\s*"([^"]+)"/, triggerType: 'ui_change' },
  { pattern: /\(mousedown\)\s*=\s*"([^"]+)"/, triggerType: 'ui_click' },
  { pattern: /\(keyup\)\s*=\s*"([^"]+)"/, triggerType: 'ui_keypress' },
];

const SELECTOR_PATTERN = /@Component\s*\(\s*\{[^}]*selector\s*:\s*['"]([^'"]+)['"]/;
const CLASS_PATTERN = /export\s+class\s+(\w+)Component/;
const TEMPLATE_URL_PATTERN = /templateUrl\s*:\s*['"]([^'"]+)['"]/;

const ROUTE_PATTERNS = [
  /path\s*:\s*['"]([^'"]+)['"]/,
  /this\.router\.navigate\s*\(\s*\[\s*['"]([^'"]+)['"]/,
];

/** Max line distance from a handler (or trigger) to the calls it makes */
const HANDLER_WINDOW = 100;

/**
 * Human component name: the selector without `app-`, the class name without
 * `Component`, else the file name
 */
export function angularComponentName(filePath: string, content: string | null): string {
  if (content) {
    const selector = SELECTOR_PATTERN.exec(content);
    if (selector) return titleCase(selector[1].replace(/^app-/, ''));
    const className = CLASS_PATTERN.exec(content);
    if (className) return className[1];
  }
  return titleCase(fileStem(filePath));
}

function detectRoute(content: string | null): string | undefined {
  if (!content) return undefined;
  for (const pattern of ROUTE_PATTERNS) {
    const match = pattern.exec(content);
    if (match) return match[1];
  }
  return undefined;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Line of the class member declaring `handler`, as a method or an arrow property
 */
export function findMethodLine(lines: readonly string[], handler: string): number | undefined {
  if (!handler) return undefined;
  const name = escapeRegExp(handler);
  const declaration = new RegExp(
    `^\\s*(?:(?:public|private|protected|async|override)\\s+)*(?:${name}\\s*\\(|${name}\\s*=\\s*(?:async\\s*)?\\()`
  );
  const index = lines.findIndex((line) => declaration.test(line));
  return index >= 0 ? index + 1 : undefined;
}

/**
 * Scanner for Angular components. A `.component.ts` runs the TypeScript
 * detections and pairs with its template; a template on its own emits its
 * event bindings.
 */
export class AngularScanner extends TypeScriptScanner {
  getName(): string {
    return 'AngularScanner';
  }

  canScan(filePath: string): boolean {
    return filePath.endsWith('.component.ts') || filePath.endsWith('.html');
  }

  async scanFile(filePath: string, registry?: SchemaRegistry): Promise<WorkflowGraph> {
    const content = await this.readFile(filePath);
    if (filePath.endsWith('.html')) {
      return this.scanTemplate(filePath, content);
    }
    return this.scanComponent(filePath, content, registry);
  }

  private async scanTemplate(templatePath: string, template: string): Promise<WorkflowGraph> {
    const graph = new WorkflowGraph();
    const componentPath = templatePath.replace(/\.html$/, '.ts');
    const component = componentPath.endsWith('.component.ts')
      ? await this.readCompanion(componentPath)
      : null;
    this.emitTriggers(templatePath, template, component, graph);
    return graph;
  }

  private async scanComponent(
    filePath: string,
    content: string,
    registry?: SchemaRegistry
  ): Promise<WorkflowGraph> {
    const graph = this.scanContent(filePath, content, registry);

    const templateUrl = TEMPLATE_URL_PATTERN.exec(content)?.[1];
    const templatePath = templateUrl
      ? path.join(path.dirname(filePath), templateUrl)
      : filePath.replace(/\.ts$/, '.html');
    const template = await this.readCompanion(templatePath);
    if (template === null) return graph;

    const triggers = this.emitTriggers(templatePath, template, content, graph);
    const calls = graph
      .getNodesByType(WorkflowType.ApiCall)
      .filter((call) => call.location.filePath === filePath);
    const lines = content.split('\n');

    for (const trigger of triggers) {
      const handlerLine = findMethodLine(lines, trigger.handler);
      const accept =
        handlerLine !== undefined
          ? (line: number) => line >= handlerLine && line - handlerLine <= HANDLER_WINDOW
          : (line: number) => Math.abs(line - trigger.lineNumber) <= HANDLER_WINDOW;
      linkCalls(
        graph,
        trigger,
        calls,
        (call) => accept(call.location.lineNumber),
        'Angular Event → HTTP Call',
        { workflowType: 'angular_ui_to_api', url: detectRoute(content), framework: 'Angular' }
      );
    }

    return graph;
  }

  private emitTriggers(
    templatePath: string,
    template: string,
    component: string | null,
    graph: WorkflowGraph
  ): UiTrigger[] {
    const lines = template.split('\n');
    return detectTriggers(
      EVENT_RULES,
      {
        filePath: templatePath,
        content: template,
        framework: 'Angular',
        ownerKey: 'component',
        owner: angularComponentName(templatePath, component),
        url: detectRoute(component) ?? detectRoute(template),
        cleanHandler,
        snippet: (lineNumber) => this.extractCodeSnippet(lines, lineNumber),
      },
      graph
    );
  }
}
