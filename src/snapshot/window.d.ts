/**
 * Page globals set by the injected scripts.
 */

declare global {
  interface Window {
    /** Elements of the last DOM capture, indexed as in the snapshot */
    __semanticElementRegistry?: Element[];
  }
}

export {};
