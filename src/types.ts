/**
 * Core types for wb-fetcher
 *
 * Re-exports all types from domain-specific files in types/.
 */

export * from './types/index'
