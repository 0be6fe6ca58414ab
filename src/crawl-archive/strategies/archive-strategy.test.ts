import { dailySource, paginatedSource } from 'test/sources';

import { createArchiveStrategy } from './archive-strategy';
import ArchiveHtmlStrategy from './archive-html.strategy';
import CategoryListingStrategy from './category-listing.strategy';
import PaginatedApiStrategy from './paginated-api.strategy';

describe('createArchiveStrategy', () => {
  test('picks the variant named by the source configuration', () => {
    expect(createArchiveStrategy(dailySource())).toBeInstanceOf(ArchiveHtmlStrategy);
    expect(createArchiveStrategy(paginatedSource())).toBeInstanceOf(CategoryListingStrategy);
    expect(
      createArchiveStrategy(
        paginatedSource({
          strategy: {
            type: 'paginated-api',
            articleUrlTemplate: 'https://wire.test/news/{id}.html',
          },
        }),
      ),
    ).toBeInstanceOf(PaginatedApiStrategy);
  });
});
