/**
 * Render a marker line pointing at column `offset` of a text `length` columns
 * wide: `indent + offset` spaces, a `^`, then one `~` per column after the
 * offset. An offset at (or past) the end yields a bare `^`.
 *
 * The caller decides where the annotated text starts on its own line and
 * passes that column as `indent`.
 */
export function renderUnderline(length: number, offset: number, indent = 0): string {
  const column = Math.max(0, offset);
  const tail = Math.max(0, length - column - 1);
  return `${" ".repeat(Math.max(0, indent) + column)}^${"~".repeat(tail)}`;
}
