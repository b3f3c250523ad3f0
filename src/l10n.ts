import * as fs from 'fs';
import * as path from 'path';
import * as l10n from '@vscode/l10n';
import { Logger } from './Logger';

const logger = new Logger('l10n');

function findBundle(language: string): string | undefined {
  const fileName = `bundle.l10n.${language}.json`;
  // l10n/ sits next to both src/ and dist/
  const bundle = path.resolve(__dirname, '..', 'l10n', fileName);
  return fs.existsSync(bundle) ? bundle : undefined;
}

/**
 * Load the message bundle for `language`. English strings are the keys, so `en`
 * needs no bundle. Returns false when falling back to English.
 */
export function configureLanguage(language: string): boolean {
  if (language === 'en') {
    l10n.config({ contents: {} });
    return false;
  }

  const bundle = findBundle(language);
  if (!bundle) {
    logger.warn(`No message bundle for "${language}", using English`);
    l10n.config({ contents: {} });
    return false;
  }

  l10n.config({ contents: fs.readFileSync(bundle, 'utf-8') });
  return true;
}
