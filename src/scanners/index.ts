import type { DetectionToggles } from '../types.js';
import { AngularScanner } from './angular-scanner.js';
import type { BaseScanner } from './base-scanner.js';
import { CSharpScanner } from './csharp-scanner.js';
import { ReactScanner } from './react-scanner.js';
import { TypeScriptScanner } from './typescript-scanner.js';
import { WpfScanner } from './wpf-scanner.js';

export { BaseScanner, DEFAULT_DETECTION, decodeSource } from './base-scanner.js';
export { CSharpScanner } from './csharp-scanner.js';
export { TypeScriptScanner } from './typescript-scanner.js';
export { ReactScanner } from './react-scanner.js';
export { AngularScanner } from './angular-scanner.js';
export { WpfScanner } from './wpf-scanner.js';

/**
 * Scanners in dispatch order. Dialect scanners come before the generic
 * scanners that share their extensions.
 */
export function createDefaultScanners(detect: Partial<DetectionToggles> = {}): BaseScanner[] {
  return [
    new WpfScanner(detect),
    new CSharpScanner(detect),
    new AngularScanner(detect),
    new ReactScanner(detect),
    new TypeScriptScanner(detect),
  ];
}

/**
 * First scanner claiming the file
 */
export function selectScanner(
  scanners: readonly BaseScanner[],
  filePath: string
): BaseScanner | undefined {
  return scanners.find((scanner) => scanner.canScan(filePath));
}
