import type { IndexedElement, UISnapshot } from "../core/snapshot.js";
import { labelOf } from "../core/snapshot.js";
import { DEFAULT_SWIPE_DIRECTION } from "../core/transforms.js";
import type { ProposedAction, ResolvedCommand } from "../core/types.js";
import { normalizeKeyName } from "../device/keys.js";
import {
  DEFAULT_STOPWORDS,
  KeywordMatchScorer,
  MATCH_THRESHOLD,
  extractKeywords,
  parseOrdinal,
  stripLocationSuffix,
  stripOrdinalWords,
  type MatchScorer,
} from "./matcher.js";

export type ResolutionSource =
  | "coordinate"
  | "index"
  | "name_check"
  | "exact"
  | "substring"
  | "ordinal"
  | "keyword"
  | "direct";

export type Resolution =
  | {
      ok: true;
      command: ResolvedCommand;
      target: string;
      via: ResolutionSource;
      element?: IndexedElement;
    }
  | { ok: false; target: string; reason: string; needsRecovery: true };

export type ResolverOptions = {
  scorer?: MatchScorer;
  stopwords?: readonly string[];
  /** Elements whose centre sits above this line (status bar) are avoided. */
  safeTopMargin?: number;
  defaultSwipeDurationMs?: number;
  defaultWaitMs?: number;
};

export const DEFAULT_SAFE_TOP_MARGIN = 150;
const DEFAULT_SWIPE_DURATION_MS = 500;
const DEFAULT_WAIT_MS = 1000;

const QUOTED_NAME = /["“「『'‘]([^"”」』'’]+)["”」』'’]/;

/** Name the planner implied in prose, e.g. `Tap result: Night Drive` or `Tap "Night Drive"`. */
export function impliedName(action: ProposedAction): string | null {
  const description = action.description.trim();
  const separator = Math.max(description.lastIndexOf("："), description.lastIndexOf(":"));
  if (separator >= 0) {
    const tail = description.slice(separator + 1).trim();
    if (tail) return tail;
  }
  const quoted = QUOTED_NAME.exec(description);
  if (quoted?.[1]) return quoted[1].trim();
  const named = action.targetName?.trim();
  return named ? named : null;
}

export function describeTarget(action: ProposedAction): string {
  if (action.targetName) return action.targetName;
  if (action.targetIndex !== undefined) return `#${action.targetIndex}`;
  if (action.coordinate) return `(${action.coordinate.x},${action.coordinate.y})`;
  const { direction, key, text, packageId } = action.parameters;
  return direction ?? key ?? packageId ?? text ?? action.kind;
}

type Ranked = { entry: IndexedElement; priority: number };

/**
 * Maps a proposed action onto a concrete device command using the snapshot the
 * action was planned against.
 */
export class ActionResolver {
  private readonly scorer: MatchScorer;
  private readonly stopwords: readonly string[];
  private readonly safeTopMargin: number;
  private readonly swipeDurationMs: number;
  private readonly waitMs: number;

  constructor(opts: ResolverOptions = {}) {
    this.scorer = opts.scorer ?? new KeywordMatchScorer(opts.stopwords);
    this.stopwords = opts.stopwords ?? DEFAULT_STOPWORDS;
    this.safeTopMargin = opts.safeTopMargin ?? DEFAULT_SAFE_TOP_MARGIN;
    this.swipeDurationMs = opts.defaultSwipeDurationMs ?? DEFAULT_SWIPE_DURATION_MS;
    this.waitMs = opts.defaultWaitMs ?? DEFAULT_WAIT_MS;
  }

  resolve(action: ProposedAction, snapshot: UISnapshot): Resolution {
    const target = describeTarget(action);
    const params = action.parameters;

    switch (action.kind) {
      case "tap":
      case "click":
        return this.resolvePoint(action, snapshot, (point) => ({ type: "tap", point }));
      case "input": {
        const text = params.text ?? "";
        if (action.coordinate || action.targetIndex !== undefined || action.targetName) {
          const focused = this.resolvePoint(action, snapshot, (point) => ({
            type: "input",
            text,
            focus: point,
          }));
          if (focused.ok) return focused;
          // An unmatched field name falls back to the focused field.
          if (action.targetIndex !== undefined) return focused;
        }
        return { ok: true, command: { type: "input", text }, target, via: "direct" };
      }
      case "swipe":
      case "scroll":
        return {
          ok: true,
          command: {
            type: "swipe",
            direction: params.direction ?? DEFAULT_SWIPE_DIRECTION,
            durationMs: params.durationMs ?? this.swipeDurationMs,
          },
          target: params.direction ?? DEFAULT_SWIPE_DIRECTION,
          via: "direct",
        };
      case "press_key": {
        const key = params.key ?? action.targetName;
        if (!key) {
          return { ok: false, target, reason: "press_key without a key name", needsRecovery: true };
        }
        return { ok: true, command: { type: "key", key: normalizeKeyName(key) }, target: key, via: "direct" };
      }
      case "back":
        return { ok: true, command: { type: "key", key: "BACK" }, target: "BACK", via: "direct" };
      case "home":
        return { ok: true, command: { type: "key", key: "HOME" }, target: "HOME", via: "direct" };
      case "wait":
        return {
          ok: true,
          command: { type: "wait", durationMs: params.durationMs ?? this.waitMs },
          target,
          via: "direct",
        };
      case "launch_app": {
        const packageId = params.packageId ?? action.targetName;
        if (!packageId) {
          return { ok: false, target, reason: "launch_app without a package id", needsRecovery: true };
        }
        return { ok: true, command: { type: "launch", packageId }, target: packageId, via: "direct" };
      }
    }
  }

  private resolvePoint(
    action: ProposedAction,
    snapshot: UISnapshot,
    build: (point: { x: number; y: number }) => ResolvedCommand
  ): Resolution {
    if (action.coordinate) {
      return {
        ok: true,
        command: build(action.coordinate),
        target: describeTarget(action),
        via: "coordinate",
      };
    }

    if (action.targetIndex !== undefined) {
      const entry = snapshot.lookupByIndex(action.targetIndex);
      if (!entry) {
        return {
          ok: false,
          target: `#${action.targetIndex}`,
          reason: `Element index ${action.targetIndex} not found (screen has ${snapshot.size} elements)`,
          needsRecovery: true,
        };
      }
      const verified = this.verifyIndexedName(action, entry, snapshot);
      return {
        ok: true,
        command: build(verified.entry.element.center),
        target: verified.entry.displayName,
        via: verified.via,
        element: verified.entry,
      };
    }

    const name = action.targetName?.trim();
    if (!name) {
      return {
        ok: false,
        target: describeTarget(action),
        reason: "No target index, name or coordinate given",
        needsRecovery: true,
      };
    }

    const match = this.matchByText(name, snapshot);
    if (!match) {
      return {
        ok: false,
        target: name,
        reason: `Target "${name}" not found on screen`,
        needsRecovery: true,
      };
    }
    return {
      ok: true,
      command: build(match.entry.element.center),
      target: match.entry.displayName,
      via: match.via,
      element: match.entry,
    };
  }

  /**
   * Planners sometimes cite the right name with the wrong number. When the
   * name implied by the description does not fit the indexed element, the best
   * scoring element at or above the threshold wins; otherwise the index stands.
   */
  private verifyIndexedName(
    action: ProposedAction,
    entry: IndexedElement,
    snapshot: UISnapshot
  ): { entry: IndexedElement; via: ResolutionSource } {
    const implied = impliedName(action);
    if (!implied) return { entry, via: "index" };
    if (this.scorer.score(implied, entry.displayName) >= MATCH_THRESHOLD) {
      return { entry, via: "index" };
    }

    let best: { entry: IndexedElement; score: number } | null = null;
    for (const candidate of snapshot.indexed) {
      const score = this.scorer.score(implied, candidate.displayName);
      if (score >= MATCH_THRESHOLD && (!best || score > best.score)) {
        best = { entry: candidate, score };
      }
    }
    return best ? { entry: best.entry, via: "name_check" } : { entry, via: "index" };
  }

  private matchByText(
    target: string,
    snapshot: UISnapshot
  ): { entry: IndexedElement; via: ResolutionSource } | null {
    const wanted = target.toLowerCase();
    const nameOf = (entry: IndexedElement) =>
      (labelOf(entry.element) || stripLocationSuffix(entry.displayName)).toLowerCase();

    const exact = snapshot.indexed.filter((entry) => nameOf(entry) === wanted);
    const pickedExact = this.pickSafe(exact.map((entry) => ({ entry, priority: 1 })));
    if (pickedExact) return { entry: pickedExact, via: "exact" };

    const substring = snapshot.indexed.filter((entry) => {
      const name = nameOf(entry);
      return name.length > 0 && (name.includes(wanted) || wanted.includes(name));
    });
    const pickedSubstring = this.pickSafe(substring.map((entry) => ({ entry, priority: 2 })));
    if (pickedSubstring) return { entry: pickedSubstring, via: "substring" };

    const keywords = extractKeywords(target, this.stopwords);
    if (keywords.length > 0) {
      const ranked: Ranked[] = [];
      for (const entry of snapshot.indexed) {
        const name = nameOf(entry);
        const hits = keywords.filter((word) => name.includes(word)).length;
        if (hits > 0) {
          ranked.push({ entry, priority: 5 - Math.min(hits, 3) });
        }
      }
      const picked = this.pickSafe(ranked);
      if (picked) return { entry: picked, via: "keyword" };
    }

    const ordinal = parseOrdinal(target);
    if (ordinal !== null) {
      const picked = this.matchByPosition(target, ordinal, snapshot);
      if (picked) return { entry: picked, via: "ordinal" };
    }

    return null;
  }

  /** `second video` → the second clickable element mentioning "video", top to bottom. */
  private matchByPosition(target: string, ordinal: number, snapshot: UISnapshot) {
    const kind = extractKeywords(stripOrdinalWords(target), this.stopwords);
    const clickable = snapshot.indexed.filter(
      (entry) => entry.element.clickable && entry.element.center.y >= this.safeTopMargin
    );
    const typed = clickable.filter((entry) => {
      const haystack = `${entry.displayName} ${entry.element.className} ${entry.element.resourceId}`.toLowerCase();
      return kind.some((word) => haystack.includes(word));
    });
    const pool = (typed.length > 0 ? typed : clickable).slice().sort((a, b) => {
      const dy = a.element.center.y - b.element.center.y;
      return dy !== 0 ? dy : a.element.center.x - b.element.center.x;
    });
    if (pool.length === 0) return null;
    const position = ordinal === -1 ? pool.length - 1 : ordinal - 1;
    return pool[position] ?? null;
  }

  /** Best-priority candidate that is clickable and below the status bar, else the first one. */
  private pickSafe(ranked: Ranked[]): IndexedElement | null {
    if (ranked.length === 0) return null;
    const ordered = ranked
      .map((item, order) => ({ ...item, order }))
      .sort((a, b) => a.priority - b.priority || a.order - b.order);
    const safe = ordered.find(
      (item) => item.entry.element.clickable && item.entry.element.center.y >= this.safeTopMargin
    );
    return (safe ?? ordered[0])?.entry ?? null;
  }
}
