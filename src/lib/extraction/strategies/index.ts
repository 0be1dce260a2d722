/**
 * Extraction strategies, one per ExtractionStrategyType
 */

import { ContentStrategy, ExtractionStrategyType } from '../extraction.types';
import { contentStrategy } from './content.strategy';
import { htmlStrategy } from './html.strategy';
import { markdownStrategy } from './markdown.strategy';

export const STRATEGIES: Readonly<Record<ExtractionStrategyType, ContentStrategy>> = {
  [ExtractionStrategyType.HTML]: htmlStrategy,
  [ExtractionStrategyType.CONTENT]: contentStrategy,
  [ExtractionStrategyType.MARKDOWN]: markdownStrategy,
};

export { contentStrategy, htmlStrategy, markdownStrategy };
