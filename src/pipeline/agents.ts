/**
 * Contracts of the upstream agents the pipeline orchestrates. Implementations
 * are injected; the core never talks to a model provider itself.
 */

export interface WebSearchItem {
  /** Search term */
  query: string;
  /** Why this search helps answer the research query */
  reason: string;
}

export interface WebSearchPlan {
  searches: WebSearchItem[];
}

export interface ReportData {
  shortSummary: string;
  markdownReport: string;
  followUpQuestions: string[];
}

export interface ResearchAgents {
  plan(query: string): Promise<WebSearchPlan>;
  search(item: WebSearchItem): Promise<string>;
  write(query: string, searchResults: string[]): Promise<ReportData>;
}
