/**
 * Cyclic selection over a layer's style names.
 * An empty list means the server's default style.
 */
export class StyleSelection {
  private styles: string[] = [];
  private index = 0;

  constructor(styles?: readonly string[]) {
    if (styles) this.setStyles(styles);
  }

  setStyles(styles: readonly string[]): void {
    this.styles = styles.filter((name) => name.trim().length > 0);
    this.index = 0;
  }

  list(): readonly string[] {
    return this.styles;
  }

  get currentIndex(): number {
    return this.index;
  }

  /** Style parameter for the request; empty string selects the default style. */
  current(): string {
    if (this.styles.length === 0) return '';
    return this.styles[this.index % this.styles.length];
  }

  /** Name shown to the operator. */
  label(): string {
    return this.current() || 'default';
  }

  next(): void {
    if (this.styles.length === 0) return;
    this.index = (this.index + 1) % this.styles.length;
  }

  prev(): void {
    if (this.styles.length === 0) return;
    this.index = (this.index - 1 + this.styles.length) % this.styles.length;
  }
}
