// packages/text/src/comment-tags.ts
import { escapeRegExp } from './section';

export interface ReplaceOptions {
  /** Maximum number of sections to rewrite; 0 rewrites all of them. */
  count?: number;
}

/**
 * A start/end comment pair that marks a section without changing how the
 * page renders:
 *
 *   <!-- report start="weekly" -->...<!-- report end="weekly" -->
 *
 * Instances are shared per (label, name); use `CommentTags.for`.
 */
export class CommentTags {
  private static readonly instances = new Map<string, CommentTags>();

  static for(name: string, label = 'tag'): CommentTags {
    const key = JSON.stringify([label, name]);
    let tags = CommentTags.instances.get(key);
    if (!tags) {
      tags = new CommentTags(name, label);
      CommentTags.instances.set(key, tags);
    }
    return tags;
  }

  private constructor(readonly name: string, readonly label: string) {}

  private tag(pos: 'start' | 'end'): string {
    return `<!-- ${this.label} ${pos}="${this.name}" -->`;
  }

  get start(): string {
    return this.tag('start');
  }

  get end(): string {
    return this.tag('end');
  }

  /** Matches a whole section; group 1 is its content. */
  sectionPattern(flags = ''): RegExp {
    return new RegExp(`${escapeRegExp(this.start)}([\\s\\S]*?)${escapeRegExp(this.end)}`, flags);
  }

  makeSection(content = ''): string {
    return `${this.start}${content}${this.end}`;
  }

  extractContent(text: string): string | null {
    const m = this.sectionPattern().exec(text);
    return m ? m[1] : null;
  }

  replaceContent(text: string, next: string, { count = 0 }: ReplaceOptions = {}): string {
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`count must be a non-negative integer, got ${count}`);
    }
    const section = this.makeSection(next);
    let done = 0;
    return text.replace(this.sectionPattern('g'), (match) => {
      if (count > 0 && done >= count) return match;
      done++;
      return section;
    });
  }
}
