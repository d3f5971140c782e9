/**
 * @fileoverview Injection tokens for the dependency injection container.
 * @module src/container/tokens
 */

export const AppConfig = Symbol('AppConfig');
export const StringClientConfig = Symbol('StringClientConfig');
export const Sleep = Symbol('Sleep');
export const StringApiClient = Symbol('StringApiClient');
export const StringDbService = Symbol('StringDbService');
export const ToolDefinitions = Symbol('ToolDefinitions');
export const CreateMcpServerInstance = Symbol('CreateMcpServerInstance');
