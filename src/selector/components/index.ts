export { ListComponent } from './list.js';
export type { ListComponentOptions } from './list.js';
export { DetailComponent } from './detail.js';
export type { DetailComponentOptions } from './detail.js';
export { StatusLineComponent } from './status-line.js';
export type { StatusLineOptions } from './status-line.js';
export { OverlayComponent } from './overlay.js';
export type { OverlayComponentOptions } from './overlay.js';
