/**
 * State graph: nodes and the arena that owns them.
 * @packageDocumentation
 */

export { StateNode } from './state-node'
export { StateGraph } from './state-graph'
