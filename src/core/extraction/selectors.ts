// CSS selectors and markers for chart page markup

export const CHART_ROW_SELECTOR = 'ul.o-chart-results-list-row';

export const LABEL_SELECTOR = 'span.c-label';

export const TITLE_SELECTOR = 'h3.c-title';

export const LINK_SELECTOR = 'a';

export const IMAGE_SELECTOR = 'img';

export const SPAN_SELECTOR = 'span';

export const META_DESCRIPTION_SELECTOR = 'meta[name="description"]';

// Artist pages live under /music/artist/... or /artist/...
export const ARTIST_HREF_MARKER = '/artist/';

// Lazy-loading attributes first; plain src last since it often holds a placeholder
export const IMAGE_ATTRIBUTES = ['data-lazy-src', 'data-src', 'data-original', 'src'] as const;

export const IMAGE_PLACEHOLDER_MARKER = 'lazyload-fallback';

// Status badges that share the label styling with artist names
export const STATUS_MARKERS: ReadonlySet<string> = new Set([
  'NEW',
  'RE-ENTRY',
  'RE- ENTRY',
  '-',
  '',
]);
