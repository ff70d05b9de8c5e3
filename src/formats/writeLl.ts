import type { EmittedModule, LlArtifact, WriteLlOptions } from './types.js';

/**
 * Escape a string for an LLVM `"..."` literal: printable ASCII except `"` and `\` is kept, everything else is `\XX`.
 */
export function escapeLlString(text: string): string {
  let out = '';
  for (const byte of Buffer.from(text, 'utf8')) {
    if (byte >= 0x20 && byte <= 0x7e && byte !== 0x22 && byte !== 0x5c) {
      out += String.fromCharCode(byte);
    } else {
      out += `\\${byte.toString(16).toUpperCase().padStart(2, '0')}`;
    }
  }
  return out;
}

/**
 * Render a lowered module as LLVM textual IR.
 */
export function writeLl(module: EmittedModule, opts?: WriteLlOptions): LlArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const annotate = opts?.annotate ?? false;

  const lines: string[] = [];
  lines.push(`; ModuleID = '${escapeLlString(module.name)}'`);
  lines.push(`source_filename = "${escapeLlString(module.name)}"`);
  lines.push('');
  lines.push(...module.globals);
  lines.push('');
  lines.push(...module.declarations);
  lines.push('');
  lines.push('define i32 @main() {');
  module.blocks.forEach((block, i) => {
    if (i > 0) lines.push('');
    lines.push(`${block.label}:`);
    for (const line of block.lines) {
      if (line.kind === 'comment') {
        if (annotate) lines.push(`  ; ${line.text}`);
        continue;
      }
      lines.push(`  ${line.text}`);
    }
  });
  lines.push('}');

  return { kind: 'll', text: lines.join(lineEnding) + lineEnding };
}
