import * as path from 'path';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { DEFAULT_SCAN_CONFIG, resolveConfig } from '../config/config-loader.js';
import { build, WorkflowGraphBuilder } from '../core/graph-builder.js';
import type { WorkflowGraph } from '../core/graph.js';
import { ConfigurationError } from '../errors.js';
import { CSharpScanner, createDefaultScanners } from '../scanners/index.js';
import { createRepo, removeRepo, source } from './fixtures.js';

const ORDER_SERVICE = source(
  'public class OrderService',
  '{',
  '    public void Save(Order order) { _context.Orders.Add(order); }',
  '    public Task Notify() => _httpClient.PostAsync("/api/notify", null);',
  '}'
);

const IMPORTER = source(
  'public class Importer',
  '    var data = await _client.GetAsync("/api/feed");',
  '',
  '    File.WriteAllText("feed.json", data);',
  '',
  '    _context.Feeds.Add(item);'
);

const roots: string[] = [];

async function repo(files: Record<string, string | Buffer>): Promise<string> {
  const root = await createRepo(files);
  roots.push(root);
  return root;
}

afterEach(async () => {
  vi.restoreAllMocks();
  await Promise.all(roots.splice(0).map((root) => removeRepo(root)));
});

describe('build', () => {
  it('should scan every file and link operations within a file', async () => {
    const root = await repo({ 'A.cs': ORDER_SERVICE, 'B.cs': 'public class Empty {}' });
    const file = path.join(root, 'A.cs');

    const result = await build(root);

    expect(result.status).toBe('completed');
    expect(result.repositoryPath).toBe(path.resolve(root));
    expect(result.totalFiles).toBe(2);
    expect(result.filesScanned).toBe(2);
    expect(result.errors).toEqual([]);
    expect(result.graph.nodes.map((node) => node.id)).toEqual([`${file}:db_write:3`, `${file}:api:4`]);
    expect(result.graph.edges).toEqual([
      {
        source: `${file}:db_write:3`,
        target: `${file}:api:4`,
        label: 'Sequential (1 lines)',
        metadata: { distance: 1 },
      },
    ]);
    expect(result.workflows).toEqual([]);
    expect(result.commitHash).toBe('unknown');
  });

  it('should add data ingestion edges from API calls to later writes', async () => {
    const root = await repo({ 'Importer.cs': IMPORTER });
    const file = path.join(root, 'Importer.cs');

    const result = await build(root);

    expect(result.graph.edges.map((edge) => [edge.source, edge.target, edge.label])).toEqual([
      [`${file}:api:2`, `${file}:file:4`, 'Sequential (2 lines)'],
      [`${file}:file:4`, `${file}:db_write:6`, 'Sequential (2 lines)'],
      [`${file}:api:2`, `${file}:db_write:6`, 'Data Ingestion'],
    ]);
  });

  it('should resolve table names from schemas found in other files', async () => {
    const root = await repo({
      'Data/AppDbContext.cs': source(
        'public class AppDbContext : DbContext',
        '{',
        '    public DbSet<Customer> Customers { get; set; }',
        '    public DbSet<Order> Orders { get; set; }',
        '}'
      ),
      'Models/Customer.cs': source(
        '[Table("tbl_customers")]',
        'public class Customer',
        '{',
        '    public int Id { get; set; }',
        '    public string Name { get; set; }',
        '}'
      ),
      'Services/CustomerService.cs': source(
        'public class CustomerService',
        '{',
        '    public void AddCustomer(Customer c) { _context.Customers.Add(c); }',
        '    public void AddOrder(Order o) { _context.Orders.Add(o); }',
        '}'
      ),
    });
    const service = path.join(root, 'Services', 'CustomerService.cs');

    const result = await build(root);

    expect(result.schemasDiscovered.size).toBe(2);
    expect(
      result.graph.nodes
        .filter((node) => node.location.filePath === service)
        .map((node) => [node.location.lineNumber, node.name, node.tableName])
    ).toEqual([
      [3, 'DB Write: tbl_customers', 'tbl_customers'],
      [4, 'DB Write: Orders', 'Orders'],
    ]);
  });

  it('should skip edge inference when it is disabled', async () => {
    const root = await repo({ 'Importer.cs': IMPORTER });

    const result = await build(root, { scanner: { edgeInference: { enabled: false } } });

    expect(result.graph.nodes).toHaveLength(3);
    expect(result.graph.edges).toEqual([]);
  });

  it('should build workflows from UI triggers', async () => {
    const root = await repo({
      'OrderForm.tsx': source(
        'export function OrderForm() {',
        "  const handleSave = () => axios.post('/api/orders', order);",
        '  return <button onClick={handleSave}>Save</button>;',
        '}'
      ),
    });

    const result = await build(root);

    expect(result.workflows.map((workflow) => [workflow.name, workflow.steps.length])).toEqual([['Save', 2]]);
  });

  it('should complete an empty repository', async () => {
    const root = await repo({});

    const result = await build(root);

    expect(result.status).toBe('completed');
    expect(result.totalFiles).toBe(0);
    expect(result.filesScanned).toBe(0);
    expect(result.graph.nodes).toEqual([]);
    expect(result.errors).toEqual([]);
    expect(result.scanTimeSeconds).toBeGreaterThanOrEqual(0);
  });

  it('should read files that are not valid UTF-8 as Latin-1', async () => {
    const root = await repo({
      'Cafe.cs': Buffer.concat([
        Buffer.from('public class Caf'),
        Buffer.from([0xe9]),
        Buffer.from('\n    _context.Orders.Add(order);\n'),
      ]),
    });
    const file = path.join(root, 'Cafe.cs');

    const result = await build(root);

    expect(result.errors).toEqual([]);
    expect(result.graph.nodes.map((node) => node.id)).toEqual([`${file}:db_write:2`]);
  });

  it('should report progress with the number of nodes found', async () => {
    const root = await repo({ 'A.cs': ORDER_SERVICE, 'B.cs': 'public class Empty {}' });
    const onProgress = vi.fn();

    await build(root, {}, onProgress);

    expect(onProgress).toHaveBeenNthCalledWith(1, 0, 2, 'Found 2 files to scan', 0);
    expect(onProgress).toHaveBeenCalledWith(2, 2, 'File scanning complete: 2 files processed', 2);
    expect(onProgress).toHaveBeenLastCalledWith(2, 2, 'Analyzing UI workflows...', 2);
  });

  it('should turn a failing progress callback into warnings', async () => {
    const root = await repo({});

    const result = await build(root, {}, () => {
      throw new Error('boom');
    });

    expect(result.status).toBe('completed');
    expect(result.warnings).toContain('Progress callback failed: boom');
  });

  it('should stop before any file when already cancelled', async () => {
    const root = await repo({ 'A.cs': ORDER_SERVICE });
    const controller = new AbortController();
    controller.abort();
    const onProgress = vi.fn();

    const result = await build(root, {}, onProgress, { signal: controller.signal });

    expect(result.status).toBe('cancelled');
    expect(result.filesScanned).toBe(0);
    expect(onProgress).toHaveBeenLastCalledWith(0, 1, 'Scan cancelled: 0 files processed', 0);
  });

  it('should stop between files when cancelled mid-scan', async () => {
    const root = await repo({ 'A.cs': ORDER_SERVICE, 'B.cs': ORDER_SERVICE, 'C.cs': ORDER_SERVICE });
    const controller = new AbortController();
    const messages: string[] = [];

    const result = await build(
      root,
      { scanner: { concurrency: 1, progressEveryFiles: 1 } },
      (current, _total, message) => {
        messages.push(message);
        if (current === 1) controller.abort();
      },
      { signal: controller.signal }
    );

    expect(result.status).toBe('cancelled');
    expect(result.filesScanned).toBe(1);
    expect(result.workflows).toEqual([]);
    expect(messages[messages.length - 1]).toBe('Scan cancelled: 1 files processed');
  });

  it('should reject a repository path that does not exist', async () => {
    const missing = path.join(await repo({}), 'missing');

    await expect(build(missing)).rejects.toThrow(ConfigurationError);
    await expect(build(missing)).rejects.toThrow(`Repository path does not exist: ${missing}`);
  });

  it('should reject a repository path that is a file', async () => {
    const root = await repo({ 'A.cs': ORDER_SERVICE });
    const file = path.join(root, 'A.cs');

    await expect(build(file)).rejects.toThrow(`Repository path is not a directory: ${file}`);
  });

  it('should record per-file failures and keep scanning', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const root = await repo({ 'A.cs': ORDER_SERVICE, 'B.cs': ORDER_SERVICE });
    const failing = path.join(root, 'A.cs');
    class FailingScanner extends CSharpScanner {
      canScan(filePath: string): boolean {
        return filePath === failing;
      }

      async scanFile(): Promise<WorkflowGraph> {
        throw new Error('unreadable');
      }
    }
    const builder = new WorkflowGraphBuilder(DEFAULT_SCAN_CONFIG, [
      new FailingScanner(),
      ...createDefaultScanners(),
    ]);

    const result = await builder.build(root);

    expect(result.errors).toEqual([`Error scanning ${failing}: unreadable`]);
    expect(result.filesScanned).toBe(1);
  });
});

describe('WorkflowGraphBuilder.findFiles', () => {
  it('should skip excluded directories, hidden paths and minified files', async () => {
    const root = await repo({
      'src/app.ts': 'export {};',
      'src/types.d.ts': 'export {};',
      'node_modules/lib/index.js': 'module.exports = {};',
      'vendor.min.js': '',
      '.hidden/secret.ts': '',
      'README.md': '',
    });

    const files = await new WorkflowGraphBuilder(resolveConfig({})).findFiles(root);

    expect(files).toEqual([path.join(root, 'src', 'app.ts'), path.join(root, 'src', 'types.d.ts')]);
  });

  it('should discover declaration files without scanning them', async () => {
    const root = await repo({ 'src/app.ts': 'export {};', 'src/types.d.ts': 'export {};' });

    const result = await build(root);

    expect(result.totalFiles).toBe(2);
    expect(result.filesScanned).toBe(1);
  });
});
