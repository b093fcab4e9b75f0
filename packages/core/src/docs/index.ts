export { renderUnitDocumentation } from './markdown.js';
