export { renderJson, renderText, toGameReport, formatCounts, formatPhaseRatings, type GameReport, type RenderOptions } from './render.js';
