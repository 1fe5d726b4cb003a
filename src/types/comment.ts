/**
 * A single guestbook entry. `time` travels over the wire as an ISO-8601
 * string, which is what `Date.prototype.toJSON` produces.
 */
export interface Comment {
  readonly username: string;
  readonly message: string;
  readonly time: Date;
}

export interface CommentPayload {
  username: string;
  message: string;
  time: string;
}

export const createComment = (username: string, message: string, time: Date = new Date()): Comment => ({
  username,
  message,
  time
});

export const toCommentPayload = (comment: Comment): CommentPayload => ({
  username: comment.username,
  message: comment.message,
  time: comment.time.toISOString()
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const isCommentPayload = (value: unknown): value is CommentPayload =>
  isRecord(value) &&
  typeof value.username === 'string' &&
  typeof value.message === 'string' &&
  typeof value.time === 'string' &&
  !Number.isNaN(Date.parse(value.time));

/** Shape accepted from clients: the server assigns `time` itself. */
export const isNewCommentBody = (value: unknown): value is Pick<CommentPayload, 'username' | 'message'> =>
  isRecord(value) && typeof value.username === 'string' && typeof value.message === 'string';
