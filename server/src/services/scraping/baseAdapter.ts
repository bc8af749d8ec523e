import type { Logger } from '../../logger';
import type { RestaurantRecord } from '../../types';

/** A page template the engine knows how to turn into restaurant records. */
export abstract class BaseAdapter {
  abstract getMeta(): { name: string };
  abstract parsePage(html: string, pageUrl: string, logger: Logger): RestaurantRecord[];
}
