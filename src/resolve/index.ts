/**
 * Resolver Module
 */

export { resolveMethodName, resolveMethodNames } from './resolver.js'
