export { parseWithSchema, readJsonFile, writeJsonFile } from './json-io.js';
