export { HumanFormatter } from './human.js';
export { JsonFormatter } from './json.js';
export { CompactFormatter } from './compact.js';
export * from './types.js';

import { CompactFormatter } from './compact.js';
import { HumanFormatter } from './human.js';
import { JsonFormatter } from './json.js';
import type { FormatOptions, IFormatter, OutputFormat } from './types.js';

export function createFormatter(format: OutputFormat, options: Partial<FormatOptions> = {}): IFormatter {
  switch (format) {
    case 'json':
      return new JsonFormatter(options);
    case 'compact':
      return new CompactFormatter(options);
    case 'human':
      return new HumanFormatter(options);
  }
}
