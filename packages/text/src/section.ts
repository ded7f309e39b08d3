// packages/text/src/section.ts
// Named comment sections inside wikitext:
//   <!-- tag start name="id" -->content<!-- tag end name="id" -->

export function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function startTag(name: string): string {
  return `<!-- tag start name="${name}" -->`;
}

export function endTag(name: string): string {
  return `<!-- tag end name="${name}" -->`;
}

export function makeSection(name: string, content = ''): string {
  return `${startTag(name)}${content}${endTag(name)}`;
}

function sectionPattern(name: string, flags: string): RegExp {
  return new RegExp(`${escapeRegExp(startTag(name))}([\\s\\S]*?)${escapeRegExp(endTag(name))}`, flags);
}

/** Content of the first section called `name`, or null when the text has none. */
export function getSectionContent(name: string, text: string): string | null {
  const m = sectionPattern(name, '').exec(text);
  return m ? m[1] : null;
}

/** Replaces the content of every section called `name`. Text without one comes back unchanged. */
export function updateSection(name: string, text: string, content: string): string {
  const next = makeSection(name, content);
  return text.replace(sectionPattern(name, 'g'), () => next);
}
