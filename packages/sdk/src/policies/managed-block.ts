/**
 * Managed blocks
 *
 * Hardline owns the lines between its markers inside files that also carry
 * distribution or operator settings. Re-rendering replaces the block.
 */

const MARKER = 'hardline managed block';

export type CommentPrefix = '#' | '//';

function markers(comment: CommentPrefix): { begin: string; end: string } {
  return { begin: `${comment} BEGIN ${MARKER}`, end: `${comment} END ${MARKER}` };
}

export function renderManagedBlock(body: string, comment: CommentPrefix = '#'): string {
  const { begin, end } = markers(comment);
  const text = body.endsWith('\n') ? body : `${body}\n`;
  return `${begin}\n${text}${end}\n`;
}

/**
 * Remove an existing managed block. An unterminated block is left alone.
 */
export function stripManagedBlock(content: string, comment: CommentPrefix = '#'): string {
  const { begin, end } = markers(comment);
  const lines = content.split('\n');
  const start = lines.findIndex((line) => line.trim() === begin);
  if (start === -1) {
    return content;
  }
  const stop = lines.findIndex((line, index) => index > start && line.trim() === end);
  if (stop === -1) {
    return content;
  }
  return [...lines.slice(0, start), ...lines.slice(stop + 1)].join('\n');
}

/** For files where the first occurrence of a setting wins (sshd_config) */
export function prependManagedBlock(current: string | null, body: string, comment: CommentPrefix = '#'): string {
  return renderManagedBlock(body, comment) + stripManagedBlock(current ?? '', comment);
}

/** For files where the last occurrence of a setting wins (apt.conf) */
export function appendManagedBlock(current: string | null, body: string, comment: CommentPrefix = '#'): string {
  const rest = stripManagedBlock(current ?? '', comment);
  const separator = rest === '' || rest.endsWith('\n') ? '' : '\n';
  return rest + separator + renderManagedBlock(body, comment);
}
