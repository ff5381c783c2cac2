/**
 * Audio — File output for toneloom.
 *
 * The only module with side effects: it owns the output file for one render.
 */

export { render, tryRender, quantize } from './wav';
export type { RenderOptions, RenderSummary, RenderResult } from './wav';
