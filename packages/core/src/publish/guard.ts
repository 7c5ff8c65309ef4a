/**
 * Publish guard
 *
 * Optimistic concurrency for publishing: an edit is only submitted when the
 * page's current revision is still the one the draft was based on, and the
 * server is asked to enforce the same base revision.
 */

export interface RevisionInfo {
  revisionId: string;
  timestamp: string;
}

export interface RevisionSource {
  /** Current revision of a page, or null when the page does not exist */
  getCurrentRevision(title: string): Promise<RevisionInfo | null>;
}

export interface EditRequest {
  title: string;
  /** Revision the text was derived from; null for a page that did not exist */
  baseRevisionId: string | null;
  text: string;
  summary: string;
  minor?: boolean;
}

export type EditSubmission =
  | { kind: 'saved'; newRevisionId: string; unchanged: boolean }
  | { kind: 'conflict'; code: string }
  | { kind: 'rejected'; code: string; reason: string };

export interface EditSubmitter {
  /** Fetch what an edit needs (such as a CSRF token) without writing anything */
  prepareEdit?(): Promise<void>;
  /** Throws on transport failure; API-level outcomes are returned */
  submitEdit(request: EditRequest): Promise<EditSubmission>;
}

export type RevisionCheck =
  | { status: 'current'; remote: RevisionInfo | null }
  | { status: 'edit_conflict'; source: 'guard'; remoteRevisionId: string | null }
  | { status: 'check_failed'; reason: string };

export type PublishResult =
  | { status: 'published'; newRevisionId: string; unchanged: boolean }
  | { status: 'edit_conflict'; source: 'guard'; remoteRevisionId: string | null }
  | { status: 'edit_conflict'; source: 'server'; code: string }
  | { status: 'rejected'; code: string; reason: string }
  | { status: 'check_failed'; reason: string }
  | { status: 'unknown'; reason: string };

/** Error codes the server uses when the page moved on under us */
export const CONFLICT_CODES: ReadonlySet<string> = new Set([
  'editconflict',
  'articleexists',
  'missingtitle',
  'pagedeleted',
]);

/**
 * Compare the page's current revision with the draft's base revision
 */
export async function checkRevision(
  title: string,
  baseRevisionId: string | null,
  source: RevisionSource
): Promise<RevisionCheck> {
  let remote: RevisionInfo | null;
  try {
    remote = await source.getCurrentRevision(title);
  } catch (error) {
    return { status: 'check_failed', reason: errorMessage(error) };
  }

  const remoteRevisionId = remote?.revisionId ?? null;
  if (remoteRevisionId !== baseRevisionId) {
    return { status: 'edit_conflict', source: 'guard', remoteRevisionId };
  }
  return { status: 'current', remote };
}

/**
 * Check the base revision, then submit. The edit request is sent at most once.
 * Anything that fails before the submit is a failed check, since nothing
 * was written.
 */
export async function checkAndPublish(
  request: EditRequest,
  wiki: RevisionSource & EditSubmitter
): Promise<PublishResult> {
  if (wiki.prepareEdit) {
    try {
      await wiki.prepareEdit();
    } catch (error) {
      return { status: 'check_failed', reason: errorMessage(error) };
    }
  }

  const check = await checkRevision(request.title, request.baseRevisionId, wiki);
  if (check.status !== 'current') {
    return check;
  }

  let submission: EditSubmission;
  try {
    submission = await wiki.submitEdit(request);
  } catch (error) {
    // The edit may or may not have been saved
    return { status: 'unknown', reason: errorMessage(error) };
  }

  switch (submission.kind) {
    case 'saved':
      return { status: 'published', newRevisionId: submission.newRevisionId, unchanged: submission.unchanged };
    case 'conflict':
      return { status: 'edit_conflict', source: 'server', code: submission.code };
    case 'rejected':
      return { status: 'rejected', code: submission.code, reason: submission.reason };
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
