/**
 * Content Strategy
 * Visible text blocks of the main content, in document order
 */

import { collectTextBlocks } from '../../processing/text.processor';
import { ContentStrategy, ExtractionContext, ExtractionStrategyType } from '../extraction.types';

export const contentStrategy: ContentStrategy = {
  type: ExtractionStrategyType.CONTENT,

  render({ root, options }: ExtractionContext): string {
    return collectTextBlocks(root.get())
      .filter((block) => block.length >= options.minTextLength)
      .join('\n\n');
  },
};
