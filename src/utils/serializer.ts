import { Timestamp } from 'firebase-admin/firestore';
import { Query, QueryErrorInfo, QueryStatus } from '../types';

/**
 * JSON shape of a query returned to clients
 */
export interface QueryView {
  queryId: string;
  text: string;
  billRefs: string[];
  status: QueryStatus;
  model: string;
  result?: string;
  errorKind?: QueryErrorInfo['kind'];
  error?: string;
  createdAt: string;
  completedAt: string | null;
}

function toIso(timestamp: Timestamp | null): string | null {
  return timestamp ? timestamp.toDate().toISOString() : null;
}

export function toQueryView(query: Query): QueryView {
  return {
    queryId: query.id,
    text: query.rawText,
    billRefs: query.contextRefs,
    status: query.status,
    model: query.result?.model ?? query.model,
    result: query.result?.answer,
    errorKind: query.errorInfo?.kind,
    error: query.errorInfo?.message,
    createdAt: query.createdAt.toDate().toISOString(),
    completedAt: toIso(query.completedAt),
  };
}
