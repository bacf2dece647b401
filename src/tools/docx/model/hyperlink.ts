/**
 * A hyperlink relationship of the main document part: its id and resolved
 * target URI. Identity is the relationship id, not the URL.
 */
export class Hyperlink {
  constructor(
    readonly id: string,
    readonly url: string,
  ) {
    Object.freeze(this);
  }
}
