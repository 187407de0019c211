import { BaseScraper } from './base-scraper';
import type { PageRequest, SearchContext } from './types';

/**
 * State Bar of Texas member directory. Searches are form posts to the
 * directory endpoint, one per seed city and one per last-name initial.
 */
export class TexasBarScraper extends BaseScraper {
  readonly id = 'texas-bar';

  protected buildSearchRequest(context: SearchContext): PageRequest {
    const params: Record<string, string> = context.dimension === 'city'
      ? { City: context.value, State: 'TX', LastName: '', FirstName: '', BarNumber: '', PracticeArea: '' }
      : { LastName: context.value, FirstName: '', City: '', BarNumber: '' };

    return {
      url: this.config.searchUrl,
      method: 'POST',
      params,
      headers: { Referer: this.config.sourceUrl ?? this.config.baseUrl },
    };
  }
}
