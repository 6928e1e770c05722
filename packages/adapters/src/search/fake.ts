import { type SearchProvider, type SearchResult } from '@worksheetbot/core';

export class FakeSearchProvider implements SearchProvider {
    public readonly queries: string[] = [];
    private failure: Error | null = null;

    public constructor(private results: SearchResult[] = []) { }

    public setResults(results: SearchResult[]): void {
        this.results = results;
    }

    public failWith(error: Error | null): void {
        this.failure = error;
    }

    public async search(query: string, options: { limit?: number } = {}): Promise<SearchResult[]> {
        this.queries.push(query);
        if (this.failure) throw this.failure;
        return options.limit === undefined ? [...this.results] : this.results.slice(0, options.limit);
    }
}
