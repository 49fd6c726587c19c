/**
 * Testing Module
 *
 * In-process stand-ins for the engine's collaborators.
 */

export * from './MockCollaborator.js';
export * from './MockTaskExecutor.js';
export * from './MockExternalService.js';
