import { FilePattern } from '../types';

/**
 * Utility class for matching file names against a task's selection pattern
 */
export class PatternMatcher {
  private pattern: FilePattern;
  private regex?: RegExp;

  constructor(pattern: FilePattern) {
    this.pattern = pattern;
    if (pattern.type === 'glob') {
      this.regex = PatternMatcher.globToRegex(pattern.glob);
    }
  }

  /**
   * Check if a file name (not a path) matches the pattern
   * Supports:
   * - Suffix match (e.g. ".log")
   * - Glob wildcards: "*" and "?"
   * - Character classes: "[abc]", "[0-9]", "[!0-9]"
   */
  matches(fileName: string): boolean {
    if (this.pattern.type === 'suffix') {
      return fileName.endsWith(this.pattern.suffix);
    }
    return this.regex !== undefined && this.regex.test(fileName);
  }

  /**
   * Human readable form of the pattern
   */
  describe(): string {
    return PatternMatcher.describe(this.pattern);
  }

  static describe(pattern: FilePattern): string {
    return pattern.type === 'glob' ? pattern.glob : `*${pattern.suffix}`;
  }

  /**
   * Convert glob pattern to an anchored regex
   */
  static globToRegex(glob: string): RegExp {
    let source = '';
    let i = 0;

    while (i < glob.length) {
      const char = glob[i];

      if (char === '*') {
        source += '.*';
      } else if (char === '?') {
        source += '.';
      } else if (char === '[') {
        // A ']' right after '[' or '[!' is a member, never the end of the class
        const first = glob[i + 1] === '!' || glob[i + 1] === '^' ? i + 2 : i + 1;
        const close = glob.indexOf(']', first + 1);
        if (close === -1) {
          // Unterminated class matches a literal bracket
          source += '\\[';
        } else {
          source += PatternMatcher.characterClass(glob.slice(i + 1, close));
          i = close;
        }
      } else {
        source += char.replace(/[.+?^${}()|[\]\\/*]/g, '\\$&');
      }
      i++;
    }

    return new RegExp(`^${source}$`, 's');
  }

  private static characterClass(body: string): string {
    const negated = body.startsWith('!') || body.startsWith('^');
    const members = (negated ? body.slice(1) : body).replace(/[\\\]^]/g, '\\$&');
    return `[${negated ? '^' : ''}${members}]`;
  }
}
