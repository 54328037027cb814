/**
 * Resolves the configured intent action of a source
 */

import { ActionResolver } from '../interfaces/services.js';
import { SourceDescriptor } from '../types/index.js';

/**
 * Uses the intent action from the configuration as-is
 */
export class ConfiguredActionResolver implements ActionResolver {
  resolve(source: SourceDescriptor, _userId: number, _quietMode: boolean): string | undefined {
    switch (source.type) {
      case 'dynamic':
        return source.intentAction;
      case 'static':
        return source.intentAction;
      case 'issue_only':
        return undefined;
    }
  }
}
