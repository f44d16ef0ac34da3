/** Stand-in used when a URL cannot be parsed at all */
const FALLBACK_URL = "http://example.com";

/**
 * Derive a filesystem-safe base name from a URL: host + path, with "/"
 * and any character other than letters, digits, "_", "-" and "." turned
 * into "_". Query string and fragment are not part of the name.
 * Length and reserved names (CON, NUL, ...) are not handled.
 */
export function baseFilename(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    parsed = new URL(FALLBACK_URL);
  }

  const host = parsed.hostname || "unknown";
  return `${host}${parsed.pathname}`
    .replace(/\//g, "_")
    .replace(/[^A-Za-z0-9_.-]/g, "_");
}

/**
 * Filenames claimed during one run. Checking for a free name and
 * recording it happen inside the single synchronous `claim` call, so two
 * workers can never be handed the same name.
 */
export class NameRegistry {
  private readonly claimed: Set<string>;

  constructor(initial: Iterable<string> = []) {
    this.claimed = new Set(initial);
  }

  /**
   * Reserve a filename for `url`: the base name if free, otherwise the
   * first free of base_2, base_3, ...
   */
  claim(url: string): string {
    const base = baseFilename(url);
    let name = base;
    let counter = 2;
    while (this.claimed.has(name)) {
      name = `${base}_${counter}`;
      counter++;
    }
    this.claimed.add(name);
    return name;
  }

  has(name: string): boolean {
    return this.claimed.has(name);
  }

  get size(): number {
    return this.claimed.size;
  }
}
