/**
 * Line filtering for log views.
 */

/**
 * Lines of `text` containing `term`, ignoring case. A blank term keeps everything.
 *
 * @example
 * searchLines("CRON[12]: run\nkernel: eth0 up", "cron") // => "CRON[12]: run"
 */
export function searchLines(text: string, term: string | undefined): string {
  const needle = term?.trim().toLowerCase();
  if (!needle) return text;
  return text
    .split("\n")
    .filter((line) => line.toLowerCase().includes(needle))
    .join("\n");
}
