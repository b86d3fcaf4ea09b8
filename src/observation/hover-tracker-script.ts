/**
 * Browser-side script for hover tracking.
 *
 * Wraps `EventTarget.prototype.addEventListener` so that any element which
 * registers a hover-family listener is marked with
 * `data-maybe-hoverable="true"`. The reducer only reads this marker.
 *
 * Listeners registered before the script ran are not seen, so the marker has
 * false negatives. The marker stays on the element for the lifetime of the
 * page.
 *
 * The script is returned as a string for context.addInitScript().
 */

export const HOVER_MARKER_ATTRIBUTE = 'data-maybe-hoverable';

export const HOVER_EVENT_TYPES = ['mouseenter', 'mouseover', 'pointerenter'] as const;

/** Page global set once listener registration is patched */
export const HOVER_TRACKER_FLAG = '__hoverTrackerInstalled';

export const HOVER_TRACKER_SCRIPT = `
(function() {
  // Prevent double-injection
  if (window[${JSON.stringify(HOVER_TRACKER_FLAG)}]) return;
  window[${JSON.stringify(HOVER_TRACKER_FLAG)}] = true;

  const HOVER_EVENTS = new Set(${JSON.stringify(HOVER_EVENT_TYPES)});
  const MARKER = ${JSON.stringify(HOVER_MARKER_ATTRIBUTE)};
  const originalAddEventListener = EventTarget.prototype.addEventListener;

  EventTarget.prototype.addEventListener = function(type, listener, options) {
    try {
      if (HOVER_EVENTS.has(type) && this instanceof Element) {
        this.setAttribute(MARKER, 'true');
      }
    } catch (error) {
      console.debug('[hover-tracker] could not mark element', error);
    }
    return originalAddEventListener.call(this, type, listener, options);
  };
})();
`;
