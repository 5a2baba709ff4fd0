/**
 * Page-side platform seams. Window, localStorage and friends satisfy
 * these structurally; tests pass an EventTarget and a Map-backed storage.
 */

export interface EventSourceLike {
  addEventListener(type: string, listener: (event: Event) => void): void;
  removeEventListener(type: string, listener: (event: Event) => void): void;
}

export interface KeyValueStorage {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
}

export interface NavigatorLike {
  readonly onLine: boolean;
}
