#!/usr/bin/env node
/**
 * GFF Tools - CLI Interface
 *
 * Command-line interface for inspecting, round-tripping and editing GFF files.
 */

import { Command } from 'commander';
import { readFile, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { describeError } from './errors.js';
import { GffBinary } from './gff-binary.js';
import { GffDocument } from './gff-document.js';
import { CachingStringResolver, MapStringResolver, type StringResolver } from './string-resolver.js';
import { toJsonTree, valueToJson } from './tree-json.js';
import { parseValueText } from './value-text.js';

const program = new Command();

// Keep in step with package.json
const version = '0.1.0';

async function loadResolver(stringsFile: string | undefined): Promise<StringResolver | undefined> {
  if (stringsFile === undefined) {
    return undefined;
  }
  const table = await MapStringResolver.fromFile({ filePath: resolve(stringsFile) });
  console.error(`Loaded ${table.size} strings from: ${stringsFile}`);
  return new CachingStringResolver(table);
}

function parseIndent(text: string): number {
  const indent = Number(text);
  if (!Number.isInteger(indent) || indent < 0) {
    throw new Error(`Invalid indent "${text}"`);
  }
  return indent;
}

program
  .name('gff-tools')
  .description('Byte-exact reader and writer for Generic File Format (GFF) files')
  .version(version);

program
  .command('dump')
  .description('Print a GFF file as JSON')
  .argument('<file>', 'GFF file to read')
  .option('--strings <file>', 'JSON string table used to resolve localized strings')
  .option('--indent <n>', 'JSON indentation', parseIndent, 2)
  .action(async (file: string, options: { strings?: string; indent: number }) => {
    try {
      const resolver = await loadResolver(options.strings);
      const document = await GffDocument.readFile({ filePath: resolve(file), resolver });
      console.log(JSON.stringify(toJsonTree(document), null, options.indent));
    } catch (error) {
      console.error('❌ Dump failed:', describeError(error));
      process.exit(1);
    }
  });

program
  .command('info')
  .description('Print the header tags and section sizes of a GFF file')
  .argument('<file>', 'GFF file to read')
  .action(async (file: string) => {
    try {
      const { header } = await GffBinary.read({ filePath: resolve(file) });
      console.log(`File type:     ${header.fileType}`);
      console.log(`File version:  ${header.fileVersion}`);
      console.log(`Structs:       ${header.structCount} @ ${header.structOffset}`);
      console.log(`Fields:        ${header.fieldCount} @ ${header.fieldOffset}`);
      console.log(`Labels:        ${header.labelCount} @ ${header.labelOffset}`);
      console.log(`Field data:    ${header.fieldDataCount} bytes @ ${header.fieldDataOffset}`);
      console.log(`Field indices: ${header.fieldIndicesCount} bytes @ ${header.fieldIndicesOffset}`);
      console.log(`List indices:  ${header.listIndicesCount} bytes @ ${header.listIndicesOffset}`);
    } catch (error) {
      console.error('❌ Info failed:', describeError(error));
      process.exit(1);
    }
  });

program
  .command('roundtrip')
  .description('Read and rewrite a GFF file, reporting whether the bytes are identical')
  .argument('<file>', 'GFF file to read')
  .option('--output <file>', 'Where to save the rewritten file')
  .action(async (file: string, options: { output?: string }) => {
    try {
      const original = await readFile(resolve(file));
      const rewritten = GffDocument.read(original).write();

      if (options.output) {
        await writeFile(resolve(options.output), rewritten);
        console.log(`Rewritten file saved to: ${options.output}`);
      }

      if (original.equals(rewritten)) {
        console.log(`✅ Round trip is byte-identical (${original.length} bytes)`);
      } else {
        console.log(`⚠️  Round trip differs: ${original.length} bytes in, ${rewritten.length} bytes out`);
        process.exitCode = 2;
      }
    } catch (error) {
      console.error('❌ Round trip failed:', describeError(error));
      process.exit(1);
    }
  });

program
  .command('get')
  .description('Print the first field with a label (breadth-first)')
  .argument('<file>', 'GFF file to read')
  .argument('<label>', 'Field label to look for')
  .option('--strings <file>', 'JSON string table used to resolve localized strings')
  .action(async (file: string, label: string, options: { strings?: string }) => {
    try {
      const resolver = await loadResolver(options.strings);
      const document = await GffDocument.readFile({ filePath: resolve(file), resolver });
      const cell = document.findLabel(label);
      if (cell === undefined) {
        console.error(`❌ No field labelled "${label}"`);
        process.exit(1);
      }
      console.log(JSON.stringify({ label: cell.label, type: cell.value.type, value: valueToJson(cell.value) }, null, 2));
    } catch (error) {
      console.error('❌ Get failed:', describeError(error));
      process.exit(1);
    }
  });

program
  .command('set')
  .description('Set the first field with a label (breadth-first) and write the result')
  .argument('<file>', 'GFF file to read')
  .argument('<label>', 'Field label to change')
  .argument('<value>', 'New value, parsed for the field\'s kind')
  .requiredOption('--output <file>', 'Where to write the edited file')
  .action(async (file: string, label: string, value: string, options: { output: string }) => {
    try {
      const document = await GffDocument.readFile({ filePath: resolve(file) });
      const cell = document.findLabel(label);
      if (cell === undefined) {
        console.error(`❌ No field labelled "${label}"`);
        process.exit(1);
      }
      cell.set(parseValueText(cell.value, value));
      await document.writeFile({ outputPath: resolve(options.output) });
      console.log(`✅ Set ${label} (${cell.value.type}) and wrote: ${options.output}`);
    } catch (error) {
      console.error('❌ Set failed:', describeError(error));
      process.exit(1);
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error('❌', describeError(error));
  process.exit(1);
});
