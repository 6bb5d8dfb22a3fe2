import type { Fragment, FragmentCategory } from '../types.js';

/**
 * Decides which client-visible category a text fragment belongs to
 */
export type FragmentClassifier = (fragment: Extract<Fragment, { kind: 'text' }>) => FragmentCategory;

export const DEFAULT_THINKING_MARKERS: readonly string[] = ['🧠', '💭', '🔍', '📍', '💡', '🔬'];
export const DEFAULT_FINAL_MARKER = '📋 **Answer:**';

export interface MarkerClassifierOptions {
  /** Leading symbols that mark introspective text */
  thinkingMarkers?: readonly string[];
  /** Literal that marks the answer as complete */
  finalMarker?: string;
}

/**
 * Classifier that trusts a fragment's own category tag and falls back to
 * marker matching for untagged text.
 */
export function createMarkerClassifier(options: MarkerClassifierOptions = {}): FragmentClassifier {
  const thinkingMarkers = (options.thinkingMarkers ?? DEFAULT_THINKING_MARKERS).filter(marker => marker !== '');
  const finalMarker = options.finalMarker ?? DEFAULT_FINAL_MARKER;

  return fragment => {
    if (fragment.category) {
      return fragment.category;
    }

    const text = fragment.content.trimStart();
    if (finalMarker !== '' && text.includes(finalMarker)) {
      return 'final';
    }
    if (thinkingMarkers.some(marker => text.startsWith(marker))) {
      return 'thinking';
    }
    return 'progress';
  };
}
