/**
 * Metric Selector Parser
 *
 * Lexical scan of a metric selector such as
 * `builtin:service.keyRequest.count.total:splitBy("dt.entity.service_method")`.
 * Transformations are only detected, never evaluated, and anything after a
 * marker is ignored. Parsing never fails.
 */

export interface ParsedSelector {
  readonly baseMetricId: string;
  readonly hasFilter: boolean;
  readonly hasSplitBy: boolean;
  readonly hasSort: boolean;
}

export const SELECTOR_MARKERS = {
  filter: ':filter(',
  splitBy: ':splitBy(',
  sort: ':sort(',
} as const;

// Priority order for base-id extraction; not the order markers appear in the text
const EXTRACTION_ORDER = [SELECTOR_MARKERS.filter, SELECTOR_MARKERS.splitBy, SELECTOR_MARKERS.sort] as const;

export function parseMetricSelector(selector: string): ParsedSelector {
  let baseMetricId = selector;
  for (const marker of EXTRACTION_ORDER) {
    const index = selector.indexOf(marker);
    if (index !== -1) {
      baseMetricId = selector.substring(0, index);
      break;
    }
  }

  return {
    baseMetricId,
    hasFilter: selector.includes(SELECTOR_MARKERS.filter),
    hasSplitBy: selector.includes(SELECTOR_MARKERS.splitBy),
    hasSort: selector.includes(SELECTOR_MARKERS.sort),
  };
}
