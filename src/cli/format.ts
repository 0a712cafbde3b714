/**
 * makegate CLI — Terminal rendering for `preview` and `list`.
 */

import chalk from 'chalk';
import type { BuildRules, Catalog } from '../types/index.js';
import { listCatalog } from '../catalog/index.js';
import { hiddenTargets } from '../parser/index.js';
import { describeTarget } from '../mcp/format.js';

const RULE = '='.repeat(70);

function heading(title: string): string[] {
  return ['', chalk.dim(RULE), `  ${chalk.bold(title)}`, chalk.dim(RULE)];
}

/** Exposed tool names, one per line, in catalog order. */
export function formatList(catalog: Catalog): string {
  return catalog.entries.map(t => t.name).join('\n');
}

/**
 * Human-readable summary of what `serve` would expose for this Makefile.
 */
export function formatPreview(rules: BuildRules, catalog: Catalog): string {
  const hidden = hiddenTargets(rules);
  const undocumented = rules.targets.filter(t => t.description === undefined);
  const out: string[] = [
    `Makefile: ${rules.file}`,
    `Total targets: ${rules.targets.length}`,
    `Exposed as MCP tools: ${chalk.green(String(catalog.entries.length))}`,
    `Hidden (@internal/@skip): ${hidden.length}`,
    `Undocumented: ${undocumented.length}`,
  ];
  if (catalog.allowList.size > 0) out.push(`Allow-list: ${[...catalog.allowList].join(', ')}`);

  if (catalog.entries.length === 0) {
    out.push('', chalk.yellow('No targets would be exposed as MCP tools.'));
    out.push("Add '## Description' comments to your Makefile targets.");
    return out.join('\n');
  }

  for (const group of listCatalog(catalog)) {
    out.push(...heading(group.category ?? 'Uncategorized'));
    for (const target of group.targets) {
      const deps = target.dependencies.length > 0
        ? chalk.dim(` → depends on: ${target.dependencies.join(', ')}`)
        : '';
      out.push('', `  ${chalk.cyan(target.name)}`, `    ${target.description ?? ''}${deps}`);
    }
  }

  if (hidden.length > 0) {
    out.push(...heading('Hidden targets (NOT exposed)'));
    for (const target of hidden) {
      out.push(`  ${target.name} ${chalk.dim(`[@${target.visibility}]`)} - ${target.description ?? ''}`);
    }
  }

  out.push(...heading('Summary'));
  out.push(`Clients would see ${catalog.entries.length} tool(s) from this Makefile.`);
  out.push("Each tool accepts optional 'variables' and 'timeout' arguments.");
  return out.join('\n');
}

/** One line per exposed target, as it appears in tool listings. */
export function formatToolDescriptions(catalog: Catalog): string {
  return catalog.entries.map(t => `${t.name}: ${describeTarget(t)}`).join('\n');
}
