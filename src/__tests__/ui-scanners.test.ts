import * as path from 'path';
import { afterEach, describe, it, expect } from 'vitest';
import { AngularScanner, angularComponentName, findMethodLine } from '../scanners/angular-scanner.js';
import { createDefaultScanners, selectScanner } from '../scanners/index.js';
import { detectComponentName, detectRoute, ReactScanner } from '../scanners/react-scanner.js';
import { cleanHandler, fileStem, titleCase } from '../scanners/ui-triggers.js';
import { detectWindowName, findHandlerMethods, WpfScanner } from '../scanners/wpf-scanner.js';
import { createRepo, removeRepo, source } from './fixtures.js';

const roots: string[] = [];

async function repo(files: Record<string, string>): Promise<string> {
  const root = await createRepo(files);
  roots.push(root);
  return root;
}

afterEach(async () => {
  await Promise.all(roots.splice(0).map((root) => removeRepo(root)));
});

describe('scanner dispatch', () => {
  const scanners = createDefaultScanners();
  const pick = (file: string) => selectScanner(scanners, file)?.getName();

  it('should prefer dialect scanners over generic ones', () => {
    expect(pick('Views/MainWindow.xaml')).toBe('WpfScanner');
    expect(pick('Views/MainWindow.xaml.cs')).toBe('WpfScanner');
    expect(pick('Services/OrderService.cs')).toBe('CSharpScanner');
    expect(pick('app/orders.component.ts')).toBe('AngularScanner');
    expect(pick('app/orders.component.html')).toBe('AngularScanner');
    expect(pick('src/OrderForm.tsx')).toBe('ReactScanner');
    expect(pick('src/api.ts')).toBe('TypeScriptScanner');
    expect(pick('src/api.d.ts')).toBeUndefined();
    expect(pick('README.md')).toBeUndefined();
  });
});

describe('ui trigger helpers', () => {
  it('should reduce handler expressions to the called name', () => {
    expect(cleanHandler('handleSave')).toBe('handleSave');
    expect(cleanHandler('refresh()')).toBe('refresh');
    expect(cleanHandler('() => this.save(order)')).toBe('save');
    expect(cleanHandler('(e) => submitOrder(e)')).toBe('submitOrder');
  });

  it('should title-case dashed and underscored names', () => {
    expect(titleCase('order-list')).toBe('Order List');
    expect(titleCase('order_history')).toBe('Order History');
  });

  it('should strip every extension from file names', () => {
    expect(fileStem('src/app/order-list.component.html')).toBe('order-list');
  });
});

describe('ReactScanner', () => {
  const ORDER_FORM = source(
    "import axios from 'axios';",
    '',
    'export function OrderForm() {',
    '  const handleSave = async () => {',
    "    await axios.post('/api/orders', order);",
    '  };',
    '',
    '  return <button onClick={handleSave}>Save</button>;',
    '}'
  );

  it('should emit click triggers linked to nearby API calls', async () => {
    const root = await repo({ 'OrderForm.tsx': ORDER_FORM });
    const file = path.join(root, 'OrderForm.tsx');

    const graph = await new ReactScanner().scanFile(file);

    expect(graph.nodes.map((node) => node.id)).toEqual([`${file}:api:5`, `${file}:ui_trigger:8`]);
    expect(graph.getNode(`${file}:ui_trigger:8`)).toMatchObject({
      type: 'data_transform',
      name: 'UI: Click',
      description: 'User interaction in OrderForm',
      metadata: {
        isUiTrigger: true,
        triggerType: 'ui_click',
        handler: 'handleSave',
        component: 'OrderForm',
        framework: 'React',
      },
    });
    expect(graph.edges).toEqual([
      {
        source: `${file}:ui_trigger:8`,
        target: `${file}:api:5`,
        label: 'User Action → API Call',
        metadata: { workflowType: 'ui_to_api', url: undefined, triggerType: 'ui_click' },
      },
    ]);
  });

  it('should not link triggers to calls more than 50 lines away', async () => {
    const padding = Array.from({ length: 60 }, () => '');
    const content = source(
      "const load = () => fetch('/api/orders');",
      ...padding,
      'export const List = () => <form onSubmit={(e) => submitOrder(e)} />;'
    );
    const root = await repo({ 'List.jsx': content });
    const file = path.join(root, 'List.jsx');

    const graph = await new ReactScanner().scanFile(file);

    expect(graph.getNode(`${file}:ui_trigger:62`)?.metadata).toMatchObject({
      triggerType: 'ui_submit',
      handler: 'submitOrder',
    });
    expect(graph.edges).toEqual([]);
  });

  it('should name components and find routes', () => {
    expect(detectComponentName('src/OrderForm.tsx', ORDER_FORM)).toBe('OrderForm');
    expect(detectComponentName('src/order-form.tsx', '<div />')).toBe('order-form');
    expect(detectRoute('<Route path="/orders" element={<Orders />} />')).toBe('/orders');
    expect(detectRoute('<div />')).toBeUndefined();
  });
});

describe('AngularScanner', () => {
  const COMPONENT = source(
    "import { Component } from '@angular/core';",
    '',
    '@Component({',
    "  selector: 'app-order-list',",
    "  templateUrl: './order-list.component.html',",
    '})',
    'export class OrderListComponent {',
    '  constructor(private http: HttpClient) {}',
    '',
    '  refresh() {',
    "    return this.http.get('/api/orders');",
    '  }',
    '',
    '  archive(id: string) {',
    "    return this.http.post('/api/orders/archive', { id });",
    '  }',
    '}'
  );

  const TEMPLATE = source(
    '<button (click)="refresh()">Refresh</button>',
    '<button (click)="archive(order.id)">Archive</button>'
  );

  it('should claim components and templates', () => {
    const scanner = new AngularScanner();
    expect(scanner.canScan('a/order-list.component.ts')).toBe(true);
    expect(scanner.canScan('a/order-list.component.html')).toBe(true);
    expect(scanner.canScan('a/orders.service.ts')).toBe(false);
  });

  it('should link template events to HTTP calls after their handler', async () => {
    const root = await repo({
      'order-list.component.ts': COMPONENT,
      'order-list.component.html': TEMPLATE,
    });
    const file = path.join(root, 'order-list.component.ts');
    const template = path.join(root, 'order-list.component.html');

    const graph = await new AngularScanner().scanFile(file);

    expect(graph.nodes.map((node) => node.id)).toEqual([
      `${file}:api:11`,
      `${file}:api:15`,
      `${template}:ui_trigger:1`,
      `${template}:ui_trigger:2`,
    ]);
    expect(graph.getNode(`${template}:ui_trigger:1`)).toMatchObject({
      name: 'Angular: Click',
      description: 'Angular event binding in Order List',
      metadata: { handler: 'refresh', component: 'Order List', framework: 'Angular' },
    });
    expect(graph.edges.map((edge) => [edge.source, edge.target])).toEqual([
      [`${template}:ui_trigger:1`, `${file}:api:11`],
      [`${template}:ui_trigger:1`, `${file}:api:15`],
      [`${template}:ui_trigger:2`, `${file}:api:15`],
    ]);
    expect(graph.edges[0]).toMatchObject({
      label: 'Angular Event → HTTP Call',
      metadata: { workflowType: 'angular_ui_to_api', framework: 'Angular', triggerType: 'ui_click' },
    });
  });

  it('should emit the same trigger nodes when the template is scanned alone', async () => {
    const root = await repo({
      'order-list.component.ts': COMPONENT,
      'order-list.component.html': TEMPLATE,
    });
    const scanner = new AngularScanner();
    const template = path.join(root, 'order-list.component.html');

    const fromComponent = await scanner.scanFile(path.join(root, 'order-list.component.ts'));
    const fromTemplate = await scanner.scanFile(template);

    expect(fromTemplate.nodes).toEqual(
      fromComponent.nodes.filter((node) => node.location.filePath === template)
    );
    expect(fromTemplate.edges).toEqual([]);
  });

  it('should name a lone template after its file', async () => {
    const root = await repo({ 'about.html': '<form (ngSubmit)="send()"></form>' });
    const file = path.join(root, 'about.html');

    const graph = await new AngularScanner().scanFile(file);

    expect(graph.nodes).toHaveLength(1);
    expect(graph.nodes[0]).toMatchObject({
      id: `${file}:ui_trigger:1`,
      name: 'Angular: Submit',
      metadata: { triggerType: 'ui_submit', handler: 'send', component: 'About' },
    });
  });

  it('should derive component names from selector, class or file', () => {
    expect(angularComponentName('x.component.ts', COMPONENT)).toBe('Order List');
    expect(angularComponentName('x.component.ts', 'export class CartComponent {}')).toBe('Cart');
    expect(angularComponentName('src/order-history.component.html', null)).toBe('Order History');
  });

  it('should find handler declarations', () => {
    const lines = COMPONENT.split('\n');
    expect(findMethodLine(lines, 'refresh')).toBe(10);
    expect(findMethodLine(lines, 'archive')).toBe(14);
    expect(findMethodLine(['  save = async () => {'], 'save')).toBe(1);
    expect(findMethodLine(lines, 'missing')).toBeUndefined();
  });
});

describe('WpfScanner', () => {
  const XAML = source(
    '<Window x:Class="Shop.Views.MainWindow"',
    '        Title="Orders">',
    '  <StackPanel>',
    '    <Button Content="Load" Click="LoadButton_Click" />',
    '    <TextBox TextChanged="Filter_TextChanged" />',
    '  </StackPanel>',
    '</Window>'
  );

  const CODE_BEHIND = source(
    'public partial class MainWindow : Window',
    '{',
    '    private async void LoadButton_Click(object sender, RoutedEventArgs e)',
    '    {',
    '        var orders = await _httpClient.GetAsync("/api/orders");',
    '    }',
    '',
    '    private void Filter_TextChanged(object sender, TextChangedEventArgs e)',
    '    {',
    '    }',
    '}'
  );

  it('should link XAML events to calls in their code-behind handler', async () => {
    const root = await repo({ 'MainWindow.xaml': XAML, 'MainWindow.xaml.cs': CODE_BEHIND });
    const xaml = path.join(root, 'MainWindow.xaml');
    const codeBehind = `${xaml}.cs`;

    const graph = await new WpfScanner().scanFile(xaml);

    expect(graph.nodes.map((node) => node.id)).toEqual([
      `${codeBehind}:api:5`,
      `${xaml}:ui_trigger:4`,
      `${xaml}:ui_trigger:5`,
    ]);
    expect(graph.getNode(`${xaml}:ui_trigger:4`)).toMatchObject({
      name: 'WPF: Click',
      description: 'WPF event binding in MainWindow',
      metadata: { handler: 'LoadButton_Click', window: 'MainWindow', framework: 'WPF' },
    });
    expect(graph.getNode(`${xaml}:ui_trigger:5`)?.metadata.triggerType).toBe('ui_change');
    expect(graph.edges).toEqual([
      {
        source: `${xaml}:ui_trigger:4`,
        target: `${codeBehind}:api:5`,
        label: 'WPF Event → HTTP Call',
        metadata: {
          workflowType: 'wpf_ui_to_api',
          handler: 'LoadButton_Click',
          framework: 'WPF',
          triggerType: 'ui_click',
        },
      },
    ]);
  });

  it('should produce the same graph from either file of the pair', async () => {
    const root = await repo({ 'MainWindow.xaml': XAML, 'MainWindow.xaml.cs': CODE_BEHIND });
    const scanner = new WpfScanner();

    const fromXaml = await scanner.scanFile(path.join(root, 'MainWindow.xaml'));
    const fromCode = await scanner.scanFile(path.join(root, 'MainWindow.xaml.cs'));

    expect(fromCode.nodes).toEqual(fromXaml.nodes);
    expect(fromCode.edges).toEqual(fromXaml.edges);
  });

  it('should fall back to proximity links when the handler is not found', async () => {
    const root = await repo({
      'OrdersPage.xaml': '<Button Click="Missing_Click" />',
      'OrdersPage.xaml.cs': source(
        'public partial class OrdersPage : Page',
        '{',
        '    void Refresh() => _client.PostAsync("/api/refresh", null);',
        '}'
      ),
    });
    const xaml = path.join(root, 'OrdersPage.xaml');

    const graph = await new WpfScanner().scanFile(xaml);

    expect(graph.edges).toHaveLength(1);
    expect(graph.edges[0]).toMatchObject({
      source: `${xaml}:ui_trigger:1`,
      target: `${xaml}.cs:api:3`,
      label: 'WPF Event → HTTP Call (proximity)',
      metadata: { workflowType: 'wpf_ui_to_api_proximity', handler: 'Missing_Click' },
    });
    expect(graph.getNode(`${xaml}:ui_trigger:1`)?.metadata.window).toBe('OrdersPage');
  });

  it('should scan XAML without code-behind', async () => {
    const root = await repo({ 'Dialog.xaml': '<Grid Loaded="Dialog_Loaded" />' });
    const xaml = path.join(root, 'Dialog.xaml');

    const graph = await new WpfScanner().scanFile(xaml);

    expect(graph.nodes).toHaveLength(1);
    expect(graph.nodes[0]).toMatchObject({
      name: 'WPF: Page Load',
      metadata: { triggerType: 'page_load', window: 'Dialog' },
    });
  });

  it('should find event handler methods by signature', () => {
    expect([...findHandlerMethods(CODE_BEHIND)]).toEqual([
      ['LoadButton_Click', 3],
      ['Filter_TextChanged', 8],
    ]);
    expect(detectWindowName('x/Main.xaml', null, CODE_BEHIND)).toBe('MainWindow');
  });
});
