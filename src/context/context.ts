/** Options for {@link Context.from}. */
export interface ContextInit {
  /** Cancels the call; forwarded to the transport unchanged. */
  signal?: AbortSignal;
  /** Caller tracing metadata, e.g. a correlation id. */
  entries?: Record<string, string>;
}

/**
 * Immutable carrier for cancellation and tracing metadata threaded through one logical call.
 *
 * Every `with*` method returns a new context; the receiver is never modified, so a caller's
 * context can be reused across calls and shared between concurrent ones.
 */
export class Context {
  /** Caller-supplied key/value metadata. */
  readonly #entries: ReadonlyMap<string, string>;
  /** Operation markers, outermost first. */
  readonly #spans: readonly string[];
  /** Cancellation signal, if any. */
  readonly #signal?: AbortSignal;

  private constructor(entries: ReadonlyMap<string, string>, spans: readonly string[], signal?: AbortSignal) {
    this.#entries = entries;
    this.#spans = spans;
    this.#signal = signal;
  }

  /** A context with no entries, spans or signal. */
  static empty(): Context {
    return new Context(new Map(), []);
  }

  /** Builds a context from a signal and plain entries. */
  static from({ signal, entries = {} }: ContextInit): Context {
    return new Context(new Map(Object.entries(entries)), [], signal);
  }

  get signal(): AbortSignal | undefined {
    return this.#signal;
  }

  get spans(): readonly string[] {
    return this.#spans;
  }

  get(key: string): string | undefined {
    return this.#entries.get(key);
  }

  has(key: string): boolean {
    return this.#entries.has(key);
  }

  /** Snapshot of the entries as a plain object. */
  entries(): Record<string, string> {
    return Object.fromEntries(this.#entries);
  }

  /** Returns a context with `key` set to `value`. */
  withEntry(key: string, value: string): Context {
    const entries = new Map(this.#entries);
    entries.set(key, value);

    return new Context(entries, this.#spans, this.#signal);
  }

  /** Returns a context with `name` appended to the spans; entries and signal are carried over. */
  withSpan(name: string): Context {
    return new Context(this.#entries, [...this.#spans, name], this.#signal);
  }

  /** Returns a context cancelled by `signal` instead of the current one. */
  withSignal(signal: AbortSignal): Context {
    return new Context(this.#entries, this.#spans, signal);
  }
}
