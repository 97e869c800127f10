/**
 * `{name}` key templates filled from regular-expression named groups.
 */

const PLACEHOLDER_REGEX = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;
const NAMED_GROUP_REGEX = /\(\?<([A-Za-z_][A-Za-z0-9_]*)>/g;

/** Placeholder names used by a key template, in order of appearance */
export function templatePlaceholders(template: string): string[] {
  return [...template.matchAll(PLACEHOLDER_REGEX)].map((m) => m[1] ?? "");
}

/** Named capture groups declared in a regular expression source */
export function namedGroups(source: string): Set<string> {
  return new Set([...source.matchAll(NAMED_GROUP_REGEX)].map((m) => m[1] ?? ""));
}

/**
 * Fills `{name}` placeholders from `groups`. Returns undefined when a
 * placeholder has no value (the group did not participate in the match).
 */
export function fillTemplate(
  template: string,
  groups: Readonly<Record<string, string | undefined>>,
): string | undefined {
  let complete = true;
  const result = template.replace(PLACEHOLDER_REGEX, (_match, name: string) => {
    const value = groups[name];
    if (value === undefined) {
      complete = false;
      return "";
    }
    return value;
  });
  return complete ? result : undefined;
}
