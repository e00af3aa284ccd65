/**
 * Reconcilers module - Sync between policy templates and the tenant
 *
 * - groups: find-or-create of the directory groups policies reference
 * - policies: substitution, lookup and create-or-update of policies
 *
 * @module reconcilers
 */

export * as groups from './groups/index.js';
export * as policies from './policies/index.js';
