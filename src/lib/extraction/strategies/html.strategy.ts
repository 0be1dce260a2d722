/**
 * HTML Strategy
 * Returns the cleaned document serialization
 */

import { ContentStrategy, ExtractionContext, ExtractionStrategyType } from '../extraction.types';

export const htmlStrategy: ContentStrategy = {
  type: ExtractionStrategyType.HTML,

  render({ $ }: ExtractionContext): string {
    return $.html();
  },
};
