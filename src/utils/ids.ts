/**
 * Opaque string ids for entries, issues and issue actions in the view.
 * Each part is URI-encoded so separators can never be forged by a source.
 */

import { IssueActionKey, IssueKey, SourceKey } from '../types/index.js';

export function encodeSourceKey(key: SourceKey): string {
  return `${encodeURIComponent(key.sourceId)}@${key.userId}`;
}

export function encodeIssueKey(key: IssueKey): string {
  return `${encodeURIComponent(key.sourceId)}/${encodeURIComponent(key.issueId)}@${key.userId}`;
}

export function encodeIssueActionKey(key: IssueActionKey): string {
  return `${encodeIssueKey(key.issueKey)}#${encodeURIComponent(key.actionId)}`;
}

export function encodeGroupId(groupId: string): string {
  return `group:${encodeURIComponent(groupId)}`;
}

/**
 * Parses an id produced by `encodeIssueKey`; returns `undefined` when malformed
 */
export function decodeIssueKey(encoded: string): IssueKey | undefined {
  const at = encoded.lastIndexOf('@');
  const slash = encoded.indexOf('/');
  if (at < 0 || slash < 0 || slash > at) {
    return undefined;
  }
  const userPart = encoded.slice(at + 1);
  if (!/^\d+$/.test(userPart)) {
    return undefined;
  }
  try {
    return {
      sourceId: decodeURIComponent(encoded.slice(0, slash)),
      issueId: decodeURIComponent(encoded.slice(slash + 1, at)),
      userId: Number(userPart)
    };
  } catch (error) {
    if (error instanceof URIError) {
      return undefined;
    }
    throw error;
  }
}
