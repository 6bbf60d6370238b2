export { toResult } from './results.js';
