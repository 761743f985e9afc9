import { createHash } from "node:crypto";

/**
 * Content normalization applied before a migration is hashed.
 */
export class ResolveConfig {
  private readonly ignored = new Set<string>();

  /**
   * Add characters to drop from migration contents before hashing.
   * Each entry must be a single code point.
   */
  ignoreChars(chars: Iterable<string>): this {
    for (const ch of chars) {
      if (Array.from(ch).length !== 1) {
        throw new TypeError(`Expected a single character, got ${JSON.stringify(ch)}`);
      }
      this.ignored.add(ch);
    }
    return this;
  }

  ignoredChars(): string[] {
    return Array.from(this.ignored).sort();
  }

  /** Strip ignored characters; iterates code points so astral characters stay intact. */
  filter(content: string): string {
    if (this.ignored.size === 0) {
      return content;
    }
    let out = "";
    for (const ch of content) {
      if (!this.ignored.has(ch)) {
        out += ch;
      }
    }
    return out;
  }
}

/**
 * SHA-256 checksum of migration contents, after dropping the characters
 * `config` ignores.
 */
export function calculateChecksum(content: string, config: ResolveConfig = new ResolveConfig()): string {
  const hash = createHash("sha256");
  hash.update(config.filter(content), "utf8");
  return hash.digest("hex");
}

/**
 * Verify that content matches expected checksum.
 * Comparison is case-insensitive.
 */
export function verifyChecksum(content: string, expectedChecksum: string, config?: ResolveConfig): boolean {
  if (!expectedChecksum) {
    return false;
  }
  const actualChecksum = calculateChecksum(content, config);
  return actualChecksum.toLowerCase() === expectedChecksum.toLowerCase();
}
