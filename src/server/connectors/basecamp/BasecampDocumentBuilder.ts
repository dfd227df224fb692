/**
 * BasecampDocumentBuilder
 *
 * Maps one Basecamp todo and its comment thread onto a NormalizedDocument
 * tree: the todo becomes a DOCUMENT, each comment a COMMENT child in source
 * order. Pure and synchronous.
 */

import { DocumentType, type NormalizedDocument } from '../../contracts/types.js';
import { MalformedRecordError } from '../../types/errors.js';
import { parseRemoteTimestamp } from '../../utils/dateUtils.js';
import { htmlToText } from '../../extraction/html/htmlToText.js';
import {
  parseRecord,
  rawRecordId,
  taskItemDetailSchema,
  type RawComment,
  type RawTaskItemDetail,
} from '../../validation/basecampSchemas.js';

export interface BuildContext {
  dataSourceId: string;
  /** Project name, stored as the document location */
  location: string;
}

export class BasecampDocumentBuilder {
  constructor(private readonly convert: (html: string) => string = htmlToText) {}

  /**
   * Build the document tree for one todo.
   *
   * @throws {MalformedRecordError} If id, creator name, updated_at, app_url or the todo content is missing
   * @throws {TimestampParseError} If an updated_at value does not match the expected pattern
   */
  build(raw: RawTaskItemDetail, ctx: BuildContext): NormalizedDocument {
    const todo = parseRecord(taskItemDetailSchema, raw, 'Todo', {
      todoId: rawRecordId(raw),
    });

    if (todo.content === undefined || todo.content === null) {
      throw new MalformedRecordError(`Todo ${todo.id} has no content`, {
        todoId: String(todo.id),
        field: 'content',
      });
    }

    const children = (todo.comments ?? []).map((comment) => this.buildComment(comment, todo.app_url, ctx));

    return {
      id: String(todo.id),
      dataSourceId: ctx.dataSourceId,
      type: DocumentType.DOCUMENT,
      title: todo.creator.name,
      content: todo.content === '' ? null : this.convert(todo.content),
      author: todo.creator.name,
      authorImageUrl: todo.creator.avatar_url ?? null,
      location: ctx.location,
      url: todo.app_url,
      timestamp: parseRemoteTimestamp(todo.updated_at),
      children,
    };
  }

  private buildComment(comment: RawComment, todoUrl: string, ctx: BuildContext): NormalizedDocument {
    return {
      id: String(comment.id),
      dataSourceId: ctx.dataSourceId,
      type: DocumentType.COMMENT,
      title: comment.creator.name,
      content: comment.content ? this.convert(comment.content) : null,
      author: comment.creator.name,
      authorImageUrl: comment.creator.avatar_url ?? null,
      location: ctx.location,
      url: `${todoUrl}#comment_${comment.id}`,
      timestamp: parseRemoteTimestamp(comment.updated_at),
      children: [],
    };
  }
}
