export { flattenTaxonomy } from './taxonomy.js';
export { flattenAuthored } from './authored.js';
export { nodeId, nodeLabel, StatementWriter } from './writer.js';
