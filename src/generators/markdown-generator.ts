import type { SerializedScanResult } from '../core/serialize.js';
import { MermaidGenerator } from './mermaid-generator.js';

export interface StoryOptions {
  /** Add a Mermaid flowchart under each story */
  diagrams?: boolean;
}

/**
 * Markdown documentation generator
 */
export class MarkdownGenerator {
  private readonly mermaid = new MermaidGenerator();

  /**
   * stories.md: a short scan overview followed by every workflow story
   */
  generateStories(result: SerializedScanResult, options: StoryOptions = {}): string {
    const lines: string[] = [
      '# Workflow Stories',
      '',
      `- **Repository**: ${result.repository_path}`,
      `- **Commit**: \`${result.commit_hash.substring(0, 7)}\``,
      `- **Files scanned**: ${result.files_scanned}`,
      `- **Operations found**: ${result.nodes.length}`,
      `- **Workflows**: ${result.workflows.length}`,
      '',
    ];

    if (result.workflows.length === 0) {
      lines.push('No user workflows were found.', '');
      return lines.join('\n');
    }

    for (const workflow of result.workflows) {
      // Demote headings one level under the document title
      const story = workflow.story
        .replace(/^# /, '## ')
        .replace('\n## Workflow Steps', '\n### Workflow Steps');
      lines.push('---', '', story);
      if (options.diagrams) {
        const diagram = this.mermaid.generateWorkflowDiagram(workflow, result);
        lines.push('```mermaid', diagram.content, '```', '');
      }
    }

    return lines.join('\n');
  }

  /**
   * Plain list of scan errors and warnings, empty when there are none
   */
  generateIssues(result: SerializedScanResult): string {
    if (result.errors.length === 0 && result.warnings.length === 0) return '';

    const lines: string[] = ['# Scan Issues', ''];
    if (result.errors.length > 0) {
      lines.push('## Errors', '', ...result.errors.map((error) => `- ${error}`), '');
    }
    if (result.warnings.length > 0) {
      lines.push('## Warnings', '', ...result.warnings.map((warning) => `- ${warning}`), '');
    }
    return lines.join('\n');
  }
}
