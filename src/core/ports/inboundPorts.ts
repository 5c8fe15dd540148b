import type { QueryResult } from "../entities/suggestion";

export interface QueryProcessorPort {
  processQuery(query: string, signal?: AbortSignal): Promise<QueryResult>;
}
