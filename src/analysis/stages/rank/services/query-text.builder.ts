/**
 * Query Text Builder
 * Combines persona role, task and description into one embedding query
 */

import { Injectable } from '@nestjs/common';
import { Query } from '../types';

export const QUERY_PART_SEPARATOR = '. ';

@Injectable()
export class QueryTextBuilder {
  build(query: Query): string {
    return [query.role, query.task, query.description ?? '']
      .map((part) => part.trim())
      .filter((part) => part.length > 0)
      .join(QUERY_PART_SEPARATOR);
  }
}
