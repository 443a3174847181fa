export { DataContainer } from './data-container.js';
