/**
 * Formatter for schemas, attribute containers and file sequences.
 *
 * - Text: human-readable with colors, one line per attribute name
 * - JSON: the serialized form, pretty-printed
 */

import pc from 'picocolors';
import type { AttributeContainer } from '../attributes/attribute-container.js';
import type { AttributeContainerSchema } from '../attributes/container-schema.js';
import type { AttributeSchema } from '../attributes/types.js';
import type { DataFileSequence } from '../sequences/data-file-sequence.js';

export interface SchemaFormatOptions {
  /** Show each entry's uuid after its name */
  showUuids?: boolean;
}

export class SchemaFormatter {
  /**
   * Format a container schema, one line per attribute name in the order
   * the names were first seen.
   */
  formatSchema(schema: AttributeContainerSchema, options: SchemaFormatOptions = {}): string {
    if (schema.size === 0) {
      return pc.dim('(empty schema)');
    }

    const lines: string[] = [];
    for (const [name, entry] of schema.entries()) {
      const uuid = options.showUuids ? pc.dim(` ${entry.uuid}`) : '';
      lines.push(`${pc.bold(name)}${uuid} ${pc.cyan(entry.type)} ${this.formatConstraint(entry)}`);
    }
    return lines.join('\n');
  }

  /**
   * Format a container: its attributes, then its enforced schema if any.
   */
  formatContainer(container: AttributeContainer): string {
    const lines: string[] = [pc.bold(`${container.size} attribute(s)`)];

    for (const attr of container) {
      const confidence = attr.confidence === undefined ? '' : pc.dim(` (${attr.confidence})`);
      lines.push(`  ${attr.name} = ${String(attr.value)}${confidence}`);
    }

    const schema = container.getSchema();
    if (schema === null) {
      lines.push(pc.yellow('No schema enforced'));
    } else {
      lines.push(pc.green('Enforced schema:'));
      for (const line of this.formatSchema(schema).split('\n')) {
        lines.push(`  ${line}`);
      }
    }

    return lines.join('\n');
  }

  formatSequence(sequence: DataFileSequence): string {
    const mode = sequence.immutableBounds ? pc.dim('immutable') : pc.yellow('mutable');
    return `${sequence.sequence} [${sequence.lowerBound}, ${sequence.upperBound}] ${mode}`;
  }

  formatJson(value: { toJSON(): unknown }): string {
    return JSON.stringify(value.toJSON(), null, 2);
  }

  private formatConstraint(entry: AttributeSchema): string {
    switch (entry.type) {
      case 'categorical':
        return entry.categories.size === 0
          ? pc.dim('{}')
          : `{${Array.from(entry.categories).join(', ')}}`;
      case 'numeric':
        return entry.range === null ? pc.dim('unset') : `[${entry.range[0]}, ${entry.range[1]}]`;
      case 'boolean':
        return pc.dim('any boolean');
    }
  }
}
