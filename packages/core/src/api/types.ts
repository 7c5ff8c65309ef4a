/**
 * MediaWiki API type definitions (formatversion=2)
 */

/** API response wrapper */
export interface ApiResponse {
  error?: ApiError;
  warnings?: Record<string, { warnings?: string }>;
}

/** API error */
export interface ApiError {
  code: string;
  info: string;
  docref?: string;
}

/** Query response */
export interface QueryResponse extends ApiResponse {
  query?: {
    pages?: PageInfo[];
    tokens?: Record<string, string>;
    redirects?: Array<{ from: string; to: string }>;
    normalized?: Array<{ from: string; to: string }>;
  };
  batchcomplete?: boolean;
}

/** Page info from query */
export interface PageInfo {
  pageid?: number;
  ns: number;
  title: string;
  missing?: boolean;
  invalid?: boolean;
  revisions?: Revision[];
}

/** Revision data */
export interface Revision {
  revid: number;
  parentid?: number;
  timestamp: string;
  slots?: {
    main?: {
      contentmodel?: string;
      content?: string;
    };
  };
}

/** Login response */
export interface LoginResponse extends ApiResponse {
  login?: {
    result: 'Success' | 'NeedToken' | 'Failed' | 'Aborted';
    lguserid?: number;
    lgusername?: string;
    reason?: string;
  };
}

/** Edit response */
export interface EditResponse extends ApiResponse {
  edit?: {
    result: 'Success' | 'Failure';
    pageid?: number;
    title?: string;
    contentmodel?: string;
    oldrevid?: number;
    newrevid?: number;
    newtimestamp?: string;
    nochange?: boolean;
    new?: boolean;
  };
}

/** Page content with metadata */
export interface PageContent {
  title: string;
  content: string;
  timestamp: string;
  revisionId: string;
  pageId: number | null;
  contentModel: string;
}
