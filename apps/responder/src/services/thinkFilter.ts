export type ThinkMarkers = { open: string; close: string };

export const DEFAULT_THINK_MARKERS: ThinkMarkers = { open: '<think>', close: '</think>' };

/**
 * Strips reasoning spans from streamed model output. Input is consumed one
 * character at a time so markers split across chunks are still found. The
 * opening marker is only recognised once its last character arrives, at
 * which point its text is removed from what was already emitted.
 */
export class ThinkBlockFilter {
  private visible = '';
  private thinking = '';
  private inside = false;
  private readonly spans: string[] = [];

  constructor(private readonly markers: ThinkMarkers = DEFAULT_THINK_MARKERS) {}

  push(chunk: string): void {
    for (const ch of chunk) {
      if (!this.inside) {
        this.visible += ch;
        if (this.visible.endsWith(this.markers.open)) {
          this.inside = true;
          this.visible = this.visible.slice(0, -this.markers.open.length);
          this.thinking = '';
        }
      } else {
        this.thinking += ch;
        if (this.thinking.endsWith(this.markers.close)) {
          this.inside = false;
          this.spans.push(this.thinking.slice(0, -this.markers.close.length));
          this.thinking = '';
        }
      }
    }
  }

  /** True while an opened span has not been closed yet. */
  get insideSpan(): boolean {
    return this.inside;
  }

  /** Reasoning text of every closed span, in order. */
  get reasoning(): readonly string[] {
    return this.spans;
  }

  /**
   * User-visible text so far. An unterminated span contributes nothing, so
   * everything from its opening marker on is dropped.
   */
  text(): string {
    return this.visible;
  }
}

export function stripThinkBlocks(text: string, markers: ThinkMarkers = DEFAULT_THINK_MARKERS): string {
  const filter = new ThinkBlockFilter(markers);
  filter.push(text);
  return filter.text();
}
