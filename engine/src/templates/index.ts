/**
 * Templates Module
 *
 * Parameterised workflow factories and the built-in catalogue.
 *
 * @module templates
 */

export * from './TemplateLibrary.js';
export * from './builtins.js';
