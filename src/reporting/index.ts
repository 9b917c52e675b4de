export { renderDuration, renderNumber } from './render-numbers.js';
export {
  asConfusionMatrix,
  type ConfusionMatrixDetails,
  type RendererOptions,
  renderConfusionMatrix,
  renderResult,
} from './renderer.js';
