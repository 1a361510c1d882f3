import { describe, it, expect } from 'vitest';
import {
  analyzeWorkflows,
  humanizeEndpoint,
  humanizeName,
  toStory,
  WorkflowAnalyzer,
} from '../analyzers/workflow-analyzer.js';
import { WorkflowGraph } from '../core/graph.js';
import { createNode, WorkflowType } from '../core/model.js';
import { orderGraph } from './fixtures.js';

describe('WorkflowAnalyzer', () => {
  it('should build one workflow per UI trigger with every reachable step', () => {
    const workflows = analyzeWorkflows(orderGraph());

    expect(workflows).toHaveLength(1);
    const [workflow] = workflows;
    expect(workflow.id).toBe('workflow_a.tsx:ui_trigger:2');
    expect(workflow.name).toBe('Save Order');
    expect(workflow.trivial).toBe(false);
    expect(workflow.trigger).toMatchObject({
      name: 'Save Order',
      component: 'OrderForm',
      interactionType: 'button_click',
      location: 'a.tsx',
      description: 'User clicks Save Order',
    });
    expect(
      workflow.steps.map((step) => [step.stepNumber, step.icon, step.title, step.description, step.technicalDetails])
    ).toEqual([
      [
        1,
        '👆',
        'User clicks in OrderForm',
        'The user starts this workflow from OrderForm.',
        'UI trigger ui_click: handleSaveOrder',
      ],
      [
        2,
        '🌐',
        'Call POST Api Orders',
        'The system communicates with an external service at /api/orders.',
        'API POST: /api/orders',
      ],
      [
        3,
        '💾',
        'Save data to Orders',
        'The system saves the information to the Orders table.',
        'Database INSERT/UPDATE: Orders',
      ],
    ]);
    expect(workflow.summary).toBe(
      'This workflow calls 1 external service(s), then saves data to 1 database table(s).'
    );
    expect(workflow.outcome).toBe('The data is saved and the user sees a success confirmation.');
  });

  it('should mark workflows whose start node is missing as trivial', () => {
    const [interaction] = new WorkflowAnalyzer(orderGraph()).identifyInteractions();

    const workflow = new WorkflowAnalyzer(new WorkflowGraph()).buildWorkflow(interaction);

    expect(workflow.steps).toEqual([]);
    expect(workflow.trivial).toBe(true);
    expect(workflow.summary).toBe('This workflow performs a simple operation.');
    expect(workflow.outcome).toBe('The action completes.');
  });

  it('should treat handler-like node names as entry points', () => {
    const graph = new WorkflowGraph();
    graph.addNode(
      createNode({
        id: 'grid.ts:transform:9',
        type: WorkflowType.DataTransform,
        name: 'onDeleteClick',
        description: '',
        location: { filePath: 'src/grid.ts', lineNumber: 9 },
      })
    );

    const [interaction] = new WorkflowAnalyzer(graph).identifyInteractions();

    expect(interaction).toMatchObject({
      name: 'Delete Click',
      component: 'grid',
      interactionType: 'button_click',
      description: 'User clicks Delete Click',
    });
  });

  it('should render a workflow as a markdown story', () => {
    const [workflow] = analyzeWorkflows(orderGraph());

    expect(toStory(workflow).split('\n')).toEqual([
      '# Save Order',
      '',
      '**What happens:** This workflow calls 1 external service(s), then saves data to 1 database table(s).',
      '',
      '**User action:** User clicks Save Order',
      '',
      '## Workflow Steps',
      '',
      '👆 **Step 1: User clicks in OrderForm**',
      'The user starts this workflow from OrderForm.',
      '_Technical: UI trigger ui_click: handleSaveOrder_',
      '',
      '🌐 **Step 2: Call POST Api Orders**',
      'The system communicates with an external service at /api/orders.',
      '_Technical: API POST: /api/orders_',
      '',
      '💾 **Step 3: Save data to Orders**',
      'The system saves the information to the Orders table.',
      '_Technical: Database INSERT/UPDATE: Orders_',
      '',
      '**Result:** The data is saved and the user sees a success confirmation.',
      '',
    ]);
  });
});

describe('humanizing helpers', () => {
  it('should turn handler names into titles', () => {
    expect(humanizeName('handleSaveOrder')).toBe('Save Order');
    expect(humanizeName('Save_Click')).toBe('Save Click');
    expect(humanizeName('onSubmit')).toBe('Submit');
  });

  it('should keep the last two meaningful endpoint segments', () => {
    expect(humanizeEndpoint('/api/orders/{id}')).toBe('Api Orders');
    expect(humanizeEndpoint('https://example.com/v1/users/:id?x=1')).toBe('V1 Users');
    expect(humanizeEndpoint(undefined)).toBe('service');
  });
});
