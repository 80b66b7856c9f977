/**
 * Shared types for bili-follow-sync
 * Used by the clients, services and CLI programs
 */

export type { Credential, CredentialSection } from './credential.js';
export type { FollowingRecord } from './following.js';
