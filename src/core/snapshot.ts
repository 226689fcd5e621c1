import type { Bounds, RawElementRecord, ScreenInfo, UIElement } from "./types.js";

export const MAX_LABEL_LENGTH = 30;
const TRUNCATE_HEAD = 15;
const TRUNCATE_TAIL = 10;

export const DEFAULT_OVERLAY_DENYLIST = ["atx", "uiautomator", "floating", "悬浮"];

export type IndexedElement = {
  index: number;
  displayName: string;
  element: UIElement;
};

const clean = (value: string | null | undefined) => (value ?? "").trim();

export function centerOf(bounds: Bounds) {
  return {
    x: Math.round((bounds.left + bounds.right) / 2),
    y: Math.round((bounds.top + bounds.bottom) / 2),
  };
}

export function toUIElement(raw: RawElementRecord): UIElement {
  const bounds = Object.freeze({ ...raw.bounds });
  return Object.freeze({
    text: clean(raw.text),
    accessibleLabel: clean(raw.label),
    className: clean(raw.className),
    resourceId: clean(raw.resourceId),
    packageName: clean(raw.packageName),
    hint: clean(raw.hint),
    bounds,
    center: Object.freeze(centerOf(bounds)),
    clickable: raw.clickable ?? false,
    scrollable: raw.scrollable ?? false,
    enabled: raw.enabled ?? true,
  });
}

export function isTextInput(element: UIElement) {
  const cls = element.className.toLowerCase();
  return cls.includes("edittext") || cls.includes("input");
}

export function labelOf(element: UIElement) {
  return element.text || element.accessibleLabel;
}

export function shortClassName(className: string) {
  const short = className.split(".").pop() ?? "";
  return short.length > 0 ? short : "Element";
}

export function truncateLabel(label: string, max = MAX_LABEL_LENGTH) {
  if (label.length <= max) {
    return label;
  }
  return `${label.slice(0, TRUNCATE_HEAD)}…${label.slice(-TRUNCATE_TAIL)}`;
}

function qualifies(element: UIElement, clickableOnly: boolean) {
  if (clickableOnly) {
    return element.clickable || isTextInput(element);
  }
  return (
    element.clickable ||
    element.scrollable ||
    isTextInput(element) ||
    labelOf(element).length > 0
  );
}

/**
 * Assigns the unified 1-based index to every qualifying element in encounter
 * order. Display names are unique within the result: a colliding name gets the
 * element's centre appended as `@(x,y)`, then `#n` if it still collides.
 */
export function buildIndex(elements: readonly UIElement[], clickableOnly = false): IndexedElement[] {
  const indexed: IndexedElement[] = [];
  const seen = new Set<string>();
  let unnamedInputs = 0;

  for (const element of elements) {
    if (!qualifies(element, clickableOnly)) continue;

    let name = truncateLabel(labelOf(element));
    if (!name) {
      if (isTextInput(element) && element.hint) {
        name = truncateLabel(element.hint);
      } else if (isTextInput(element)) {
        unnamedInputs += 1;
        name = `[input ${unnamedInputs}]`;
      } else {
        name = `[${shortClassName(element.className)}]`;
      }
    }

    if (seen.has(name)) {
      const located = `${name}@(${element.center.x},${element.center.y})`;
      name = located;
      let n = 2;
      while (seen.has(name)) {
        name = `${located}#${n}`;
        n += 1;
      }
    }
    seen.add(name);
    indexed.push({ index: indexed.length + 1, displayName: name, element });
  }

  return indexed;
}

export function isOverlayElement(element: UIElement, denylist: readonly string[]) {
  if (denylist.length === 0) return false;
  const haystack = [
    element.text,
    element.accessibleLabel,
    element.resourceId,
    element.className,
    element.packageName,
  ]
    .join(" ")
    .toLowerCase();
  return denylist.some((keyword) => keyword.length > 0 && haystack.includes(keyword.toLowerCase()));
}

export type SnapshotOptions = {
  overlayDenylist?: readonly string[];
  clickableOnly?: boolean;
  screenshot?: Uint8Array;
  screen?: ScreenInfo;
  capturedAt?: number;
};

/**
 * One immutable capture of the screen. Indices handed to the planner are only
 * meaningful against the snapshot that produced them.
 */
export class UISnapshot {
  readonly elements: readonly UIElement[];
  readonly indexed: readonly IndexedElement[];
  readonly screenshot?: Uint8Array;
  readonly screen?: ScreenInfo;
  readonly capturedAt: number;

  constructor(elements: readonly UIElement[], opts: SnapshotOptions = {}) {
    const denylist = opts.overlayDenylist ?? DEFAULT_OVERLAY_DENYLIST;
    this.elements = Object.freeze(elements.filter((el) => !isOverlayElement(el, denylist)));
    this.indexed = Object.freeze(buildIndex(this.elements, opts.clickableOnly ?? false));
    this.screenshot = opts.screenshot;
    this.screen = opts.screen;
    this.capturedAt = opts.capturedAt ?? Date.now();
  }

  static capture(records: readonly RawElementRecord[], opts: SnapshotOptions = {}) {
    return new UISnapshot(records.map(toUIElement), opts);
  }

  static empty(opts: SnapshotOptions = {}) {
    return new UISnapshot([], opts);
  }

  get size() {
    return this.indexed.length;
  }

  isEmpty() {
    return this.indexed.length === 0;
  }

  /** Returns null for anything outside 1..size; never throws. */
  lookupByIndex(index: number): IndexedElement | null {
    if (!Number.isInteger(index) || index < 1 || index > this.indexed.length) {
      return null;
    }
    return this.indexed[index - 1] ?? null;
  }

  findByName(name: string): IndexedElement | null {
    const wanted = name.trim();
    if (!wanted) return null;
    return (
      this.indexed.find((entry) => entry.displayName === wanted) ??
      this.indexed.find((entry) => labelOf(entry.element) === wanted) ??
      null
    );
  }

  elementNames(): string[] {
    return this.indexed.map((entry) => entry.displayName);
  }

  hasTextInput() {
    return this.elements.some(isTextInput);
  }

  isHomeScreen(markers: readonly string[]) {
    const lowered = markers.map((m) => m.toLowerCase()).filter((m) => m.length > 0);
    if (lowered.length === 0) return false;
    return this.elements.some((el) => {
      const fields = `${el.packageName} ${el.resourceId} ${el.className}`.toLowerCase();
      return lowered.some((marker) => fields.includes(marker));
    });
  }
}
