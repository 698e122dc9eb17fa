import type { Batch, ClassificationRules, HistorySnapshot, RemoteItem } from "../core/schema";

export const DEFAULT_RULES: ClassificationRules = {
  excludedMarkers: ["gabarito"],
  allowedExtensions: ["pdf", "png", "jpg", "jpeg"],
};

/**
 * Extension after the last dot, lower-cased. Empty when the name has none.
 */
export const extensionOf = (name: string): string => {
  const dot = name.lastIndexOf(".");
  return dot === -1 ? "" : name.slice(dot + 1).toLowerCase();
};

export const isAnswerKey = (name: string, rules: ClassificationRules): boolean => {
  const lower = name.toLowerCase();
  return rules.excludedMarkers.some((marker) => lower.includes(marker.toLowerCase()));
};

export const hasAllowedExtension = (name: string, rules: ClassificationRules): boolean => {
  const extension = extensionOf(name);
  return (
    extension.length > 0 &&
    rules.allowedExtensions.some((allowed) => allowed.replace(/^\./, "").toLowerCase() === extension)
  );
};

export const isEligible = (
  item: RemoteItem,
  history: HistorySnapshot,
  rules: ClassificationRules
): boolean =>
  !history.processedIds.has(item.id) &&
  !isAnswerKey(item.name, rules) &&
  hasAllowedExtension(item.name, rules);

/**
 * Selects the unprocessed answer cards of a listing, keeping listing order.
 */
export const classify = (
  listing: ReadonlyArray<RemoteItem>,
  history: HistorySnapshot,
  rules: ClassificationRules = DEFAULT_RULES
): Batch => listing.filter((item) => isEligible(item, history, rules));
