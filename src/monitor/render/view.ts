import { renderCompactView } from './compact-view.js';
import { renderFullView } from './full-view.js';
import type { MonitorSnapshot, RenderOptions } from './snapshot.js';

export const INITIALIZING_MESSAGE = 'Initializing...';

/** Viewports shorter than this many rows use the compact view */
export const COMPACT_HEIGHT_THRESHOLD = 10;

export type ViewMode = 'initializing' | 'compact' | 'full';

export function selectViewMode(width: number, height: number): ViewMode {
  if (width === 0 || height === 0) {
    return 'initializing';
  }
  return height < COMPACT_HEIGHT_THRESHOLD ? 'compact' : 'full';
}

/**
 * Renders the snapshot for a viewport. Pure: the same snapshot and size
 * always give the same text.
 */
export function render(snapshot: MonitorSnapshot, width: number, height: number, options: RenderOptions): string {
  switch (selectViewMode(width, height)) {
    case 'initializing':
      return INITIALIZING_MESSAGE;
    case 'compact':
      return renderCompactView(snapshot, options);
    case 'full':
      return renderFullView(snapshot, width, options);
  }
}
