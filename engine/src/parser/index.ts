/**
 * Parser Module
 *
 * JSON / YAML import and export of workflow definitions.
 *
 * @module parser
 */

export * from './SchemaValidator.js';
export * from './WorkflowParser.js';
export * from './WorkflowSerializer.js';
