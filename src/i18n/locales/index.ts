/**
 * Bundled locale resources
 *
 * UI strings (common, errors) are loaded into i18next; route segment tables
 * feed the PathTranslator.
 */

import enCommon from './en/common.json';
import enErrors from './en/errors.json';
import enRoutes from './en/routes.json';
import frCommon from './fr/common.json';
import frErrors from './fr/errors.json';
import frRoutes from './fr/routes.json';
import ptCommon from './pt/common.json';
import ptErrors from './pt/errors.json';
import ptRoutes from './pt/routes.json';
import jpCommon from './jp/common.json';
import jpErrors from './jp/errors.json';
import jpRoutes from './jp/routes.json';
import type { PathTranslationTable } from '../types';

export const uiResources = {
  en: { common: enCommon, errors: enErrors },
  fr: { common: frCommon, errors: frErrors },
  pt: { common: ptCommon, errors: ptErrors },
  jp: { common: jpCommon, errors: jpErrors },
};

export const routeSegments: PathTranslationTable = {
  en: enRoutes,
  fr: frRoutes,
  pt: ptRoutes,
  jp: jpRoutes,
};
