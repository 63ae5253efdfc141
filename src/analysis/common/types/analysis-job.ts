/**
 * What a run analyses: the documents and the persona/task query
 */

import type { DocumentRef } from '../../stages/extract/types';
import type { Query } from '../../stages/rank/types';

export interface AnalysisJob {
  documents: DocumentRef[];
  query: Query;
}
