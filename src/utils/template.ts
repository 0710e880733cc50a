/**
 * Replaces `{name}` placeholders in a single pass. Unknown placeholders are
 * left as they are and substituted values are never expanded again.
 */
export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (placeholder: string, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? values[key] : placeholder,
  );
}
