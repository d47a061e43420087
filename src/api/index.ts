/**
 * Complexity-stratified API namespaces.
 *
 * - `query.*` - O(log n) and O(1) operations (tree descents)
 * - `scan.*` - O(n) operations (registry walks)
 */

export { query } from './query.ts';
export { scan } from './scan.ts';
