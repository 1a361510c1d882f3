import * as path from 'path';
import type { WorkflowGraph } from '../core/graph.js';
import { createEdge, createNode, nodeId, WorkflowType, type WorkflowNode } from '../core/model.js';

export type TriggerType = 'ui_click' | 'ui_submit' | 'ui_change' | 'ui_keypress' | 'page_load';

export const TRIGGER_LABELS: Record<TriggerType, string> = {
  ui_click: 'Click',
  ui_submit: 'Submit',
  ui_change: 'Change',
  ui_keypress: 'Keypress',
  page_load: 'Page Load',
};

export type UiFramework = 'React' | 'Angular' | 'WPF';

export interface TriggerRule {
  /** First capture group is the handler expression */
  pattern: RegExp;
  triggerType: TriggerType;
}

/**
 * Where the triggers of one file come from and how their nodes are labelled
 */
export interface TriggerSource {
  filePath: string;
  content: string;
  framework: UiFramework;
  /** `component` for web frameworks, `window` for WPF */
  ownerKey: 'component' | 'window';
  owner: string;
  url?: string;
  /** Turns the raw handler expression into a handler name */
  cleanHandler?: (expression: string) => string;
  snippet(lineNumber: number): string;
}

export interface UiTrigger {
  nodeId: string;
  triggerType: TriggerType;
  handler: string;
  lineNumber: number;
}

const NAME_PREFIX: Record<UiFramework, string> = {
  React: 'UI',
  Angular: 'Angular',
  WPF: 'WPF',
};

const DESCRIPTION: Record<UiFramework, (owner: string) => string> = {
  React: (owner) => `User interaction in ${owner}`,
  Angular: (owner) => `Angular event binding in ${owner}`,
  WPF: (owner) => `WPF event binding in ${owner}`,
};

/**
 * Handler name from an event expression:
 * `handleSave` → `handleSave`, `() => save(order)` → `save`, `this.submit()` → `submit`
 */
export function cleanHandler(expression: string): string {
  const trimmed = expression.trim();
  const arrow = trimmed.indexOf('=>');
  const body = arrow >= 0 ? trimmed.slice(arrow + 2) : trimmed;
  const call = /([\w$.]+)\s*\(/.exec(body);
  const name = call ? call[1] : body.replace(/[()]/g, '');
  return name.replace(/^this\./, '').replace(/;$/, '').trim();
}

/**
 * `order-form` → `Order Form`
 */
export function titleCase(value: string): string {
  return value
    .split(/[\s_-]+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

/**
 * File name without directory and without every extension
 */
export function fileStem(filePath: string): string {
  const base = path.basename(filePath);
  const dot = base.indexOf('.');
  return dot > 0 ? base.slice(0, dot) : base;
}

/**
 * Emit one trigger node per line that matches a rule (first rule wins) and
 * return the triggers for linking
 */
export function detectTriggers(
  rules: readonly TriggerRule[],
  source: TriggerSource,
  graph: WorkflowGraph
): UiTrigger[] {
  const triggers: UiTrigger[] = [];
  const clean = source.cleanHandler ?? ((expression: string) => expression.trim());

  source.content.split('\n').forEach((line, index) => {
    const lineNumber = index + 1;
    for (const rule of rules) {
      const match = rule.pattern.exec(line);
      if (!match) continue;

      const handler = clean(match[1] ?? '');
      const id = nodeId(source.filePath, 'ui_trigger', lineNumber);
      graph.addNode(
        createNode({
          id,
          type: WorkflowType.DataTransform,
          name: `${NAME_PREFIX[source.framework]}: ${TRIGGER_LABELS[rule.triggerType]}`,
          description: DESCRIPTION[source.framework](source.owner),
          location: { filePath: source.filePath, lineNumber },
          codeSnippet: source.snippet(lineNumber),
          metadata: {
            isUiTrigger: true,
            triggerType: rule.triggerType,
            handler,
            [source.ownerKey]: source.owner,
            url: source.url,
            framework: source.framework,
          },
        })
      );
      triggers.push({ nodeId: id, triggerType: rule.triggerType, handler, lineNumber });
      break;
    }
  });

  return triggers;
}

/**
 * Link a trigger to every call `accept` keeps. Returns the number of new edges.
 */
export function linkCalls(
  graph: WorkflowGraph,
  trigger: UiTrigger,
  calls: readonly WorkflowNode[],
  accept: (call: WorkflowNode) => boolean,
  label: string,
  metadata: Record<string, unknown>
): number {
  let added = 0;
  for (const call of calls) {
    if (!accept(call)) continue;
    const edge = createEdge(trigger.nodeId, call.id, label, {
      ...metadata,
      triggerType: trigger.triggerType,
    });
    if (graph.addEdge(edge)) added++;
  }
  return added;
}
