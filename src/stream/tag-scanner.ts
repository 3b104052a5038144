/**
 * Tag Scanner
 *
 * Splits an incrementally arriving text stream into classified segments.
 * Paired tags (`<code>…</code>`, `<output>…</output>`) switch the active
 * region; standalone markers (`</think>`) are reported without touching it.
 *
 * Only the unconsumed tail is ever re-examined. Anything that could still turn
 * into a marker stays in `pending` until the next feed settles it, so a marker
 * is never split across two emitted segments.
 */

export type Region = string | null;

export type ScanEvent =
  | { type: 'text'; text: string; region: Region }
  | { type: 'tag'; name: string; closing: boolean; raw: string }
  | { type: 'marker'; name: string; raw: string };

export interface TagVocabulary {
  /** Names of paired tags, written as `<name>` and `</name>`. */
  pairedTags: readonly string[];
  /** Standalone markers by name. */
  markers: Readonly<Record<string, string>>;
}

export const CODE_TAG = 'code';
export const OUTPUT_TAG = 'output';
export const REASONING_END = 'reasoning-end';
export const REASONING_END_MARKER = '</think>';

export const DEFAULT_VOCABULARY: TagVocabulary = {
  pairedTags: [CODE_TAG, OUTPUT_TAG],
  markers: { [REASONING_END]: REASONING_END_MARKER },
};

export function openTag(name: string): string {
  return `<${name}>`;
}

export function closeTag(name: string): string {
  return `</${name}>`;
}

type Token =
  | { kind: 'tag'; name: string; closing: boolean; raw: string }
  | { kind: 'marker'; name: string; raw: string };

export class TagScanner {
  private buffer = '';
  private active: Region = null;
  private readonly tokens: Token[];
  private readonly startChars: Set<string>;

  constructor(vocabulary: TagVocabulary = DEFAULT_VOCABULARY) {
    const tokens: Token[] = [];
    for (const name of vocabulary.pairedTags) {
      tokens.push({ kind: 'tag', name, closing: false, raw: openTag(name) });
      tokens.push({ kind: 'tag', name, closing: true, raw: closeTag(name) });
    }
    for (const [name, raw] of Object.entries(vocabulary.markers)) {
      if (raw) tokens.push({ kind: 'marker', name, raw });
    }
    // Longest first, so a token that prefixes another never shadows it
    this.tokens = tokens.sort((a, b) => b.raw.length - a.raw.length);
    this.startChars = new Set(this.tokens.map(token => token.raw[0]));
  }

  /** Text held back because it may be the start of a marker. */
  get pending(): string {
    return this.buffer;
  }

  get region(): Region {
    return this.active;
  }

  feed(chunk: string): ScanEvent[] {
    this.buffer += chunk;
    const events: ScanEvent[] = [];

    let start = 0;
    let cursor = 0;

    for (;;) {
      const candidate = this.nextStart(cursor);

      if (candidate === -1) {
        this.pushText(events, this.buffer.slice(start));
        this.buffer = '';
        break;
      }

      const token = this.matchAt(candidate);
      if (token) {
        this.pushText(events, this.buffer.slice(start, candidate));
        this.apply(events, token);
        start = cursor = candidate + token.raw.length;
        continue;
      }

      if (this.isPartialAt(candidate)) {
        this.pushText(events, this.buffer.slice(start, candidate));
        this.buffer = this.buffer.slice(candidate);
        break;
      }

      cursor = candidate + 1;
    }

    return events;
  }

  /**
   * End of stream: whatever is still pending can no longer become a marker
   * and goes out as text of the active region.
   */
  flush(): ScanEvent[] {
    const events: ScanEvent[] = [];
    this.pushText(events, this.buffer);
    this.buffer = '';
    return events;
  }

  reset(): void {
    this.buffer = '';
    this.active = null;
  }

  private nextStart(from: number): number {
    for (let i = from; i < this.buffer.length; i++) {
      if (this.startChars.has(this.buffer[i])) return i;
    }
    return -1;
  }

  private matchAt(index: number): Token | undefined {
    return this.tokens.find(token => this.buffer.startsWith(token.raw, index));
  }

  private isPartialAt(index: number): boolean {
    const rest = this.buffer.slice(index);
    return this.tokens.some(token => token.raw.length > rest.length && token.raw.startsWith(rest));
  }

  private apply(events: ScanEvent[], token: Token): void {
    if (token.kind === 'marker') {
      events.push({ type: 'marker', name: token.name, raw: token.raw });
      return;
    }
    events.push({ type: 'tag', name: token.name, closing: token.closing, raw: token.raw });
    this.active = token.closing ? null : token.name;
  }

  private pushText(events: ScanEvent[], text: string): void {
    if (text) {
      events.push({ type: 'text', text, region: this.active });
    }
  }
}

/**
 * Merge adjacent text events of the same region. Two scans of the same input
 * under different chunkings compare equal after this.
 */
export function coalesce(events: readonly ScanEvent[]): ScanEvent[] {
  const merged: ScanEvent[] = [];
  for (const event of events) {
    const last = merged[merged.length - 1];
    if (event.type === 'text' && last?.type === 'text' && last.region === event.region) {
      merged[merged.length - 1] = { ...last, text: last.text + event.text };
    } else {
      merged.push(event);
    }
  }
  return merged;
}

/** Reassemble the exact input from a list of events. */
export function rawText(events: readonly ScanEvent[]): string {
  return events.map(event => (event.type === 'text' ? event.text : event.raw)).join('');
}
