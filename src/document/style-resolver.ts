// Style Resolver - picks the first paragraph style a template actually defines

import type { StyleCatalog, StyleDefinition } from '../types/document.types';

export const BHK_STANDARD_STYLE = 'BHK_Standard';
export const NORMAL_STYLE = 'Normal';

/**
 * Style names are matched against both the style id and its display name,
 * ignoring case, spaces and underscores ("BHK_Standard", "BHK Standard" and
 * "BHKStandard" all name the same style).
 */
function normalizeStyleName(name: string): string {
  return name.replace(/[\s_]+/g, '').toLowerCase();
}

export function findParagraphStyle(catalog: StyleCatalog, name: string): StyleDefinition | undefined {
  const wanted = normalizeStyleName(name);
  return catalog.paragraphStyles.find(
    (style) => normalizeStyleName(style.id) === wanted || normalizeStyleName(style.name) === wanted
  );
}

export function getDefaultParagraphStyle(catalog: StyleCatalog): StyleDefinition | undefined {
  return catalog.paragraphStyles.find((style) => style.isDefault)
    ?? findParagraphStyle(catalog, NORMAL_STYLE);
}

/**
 * Try each candidate in order; the first one the catalog defines wins.
 * Returns null when none is defined, meaning the paragraph stays unstyled.
 */
export function resolveParagraphStyle(
  candidates: readonly string[],
  catalog: StyleCatalog
): StyleDefinition | null {
  for (const candidate of candidates) {
    const style = findParagraphStyle(catalog, candidate);
    if (style) {
      return style;
    }
  }
  return null;
}

const BUILT_IN_HEADINGS: StyleDefinition[] = [1, 2, 3, 4, 5, 6].map((level) => ({
  id: `Heading${level}`,
  name: `heading ${level}`,
  isDefault: false
}));

/**
 * Catalog used when no template is configured: the styles the writer's
 * built-in stylesheet provides. There is no BHK_Standard among them.
 */
export const DEFAULT_STYLE_CATALOG: StyleCatalog = {
  paragraphStyles: [
    { id: NORMAL_STYLE, name: NORMAL_STYLE, isDefault: true },
    { id: 'Title', name: 'Title', isDefault: false },
    ...BUILT_IN_HEADINGS
  ]
};
