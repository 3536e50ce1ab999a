// Tray menu re-entrancy guard.
//
// Toggling "menuBarEnabled" quickly runs the tray rebuild handler again
// while the previous run is still tearing down its tray, and the DBus
// StatusNotifier registration races. The handler gets a time-boxed `_running`
// flag, and the teardown of the old tray is followed by a short pause.
//
// Minified shape (names vary per release):
//   on("menuBarEnabled",()=>{Kt()})
//   ...});let Ue=null;function Kt(){const t=...;Ue&&(Ue.destroy(),Ue=null)...}
//
// After patching:
//   async function Kt(){if(Kt._running)return;Kt._running=true;setTimeout(()=>Kt._running=false,500);
//   ...Ue&&(Ue.destroy(),Ue=null,await new Promise(r=>setTimeout(r,50)))...}

import { TrayPatchTiming } from '../types';
import { debug } from '../utils';
import {
  applyRewriteRules,
  discoverIdentifiers,
  escapeIdent,
  escapeRegExp,
  IdentifierRule,
  Identifiers,
  RewriteRule,
} from './rules';

export const MAIN_INDEX_FILE = '.vite/build/index.js';

export const TRAY_IDENTIFIER_RULES: IdentifierRule[] = [
  {
    key: 'trayFn',
    anchor: 'the menuBarEnabled tray handler',
    pattern: () => /on\("menuBarEnabled",\(\)=>\{([$\w]+)\(\)\}/,
  },
  {
    key: 'trayVar',
    anchor: 'the tray variable declared before the tray handler',
    pattern: ({ trayFn }) =>
      new RegExp(
        `\\}\\);let ([$\\w]+)=null;(?:async )?function ${escapeIdent(trayFn)}\\(`
      ),
  },
  {
    key: 'firstConst',
    anchor: 'the first const declared in the tray handler',
    pattern: ({ trayFn }) =>
      new RegExp(
        `(?:async )?function ${escapeIdent(trayFn)}\\(\\)\\{.*?const ([$\\w]+)=`
      ),
  },
];

const trayDestroy = (trayVar: string): string =>
  `${trayVar}&&(${trayVar}.destroy(),${trayVar}=null`;

export const trayRewriteRules = (timing: TrayPatchTiming): RewriteRule[] => [
  {
    name: 'async handler',
    anchor: 'the tray handler definition',
    find: ({ trayFn }) =>
      new RegExp(`(?<!async )function ${escapeIdent(trayFn)}\\(\\)\\{`, 'g'),
    replace: ({ trayFn }) => `async function ${trayFn}(){`,
    applied: ({ trayFn }) => `async function ${trayFn}(){`,
  },
  {
    name: 'mutex guard',
    anchor: 'the async tray handler definition',
    find: ({ trayFn }) =>
      new RegExp(`async function ${escapeIdent(trayFn)}\\(\\)\\{`, 'g'),
    replace: ({ trayFn }) =>
      `async function ${trayFn}(){if(${trayFn}._running)return;${trayFn}._running=true;` +
      `setTimeout(()=>${trayFn}._running=false,${timing.trayMutexResetMs});`,
    applied: ({ trayFn }) => `${trayFn}._running`,
  },
  {
    name: 'cleanup delay',
    anchor: 'the tray destroy call',
    find: ({ trayVar }) => new RegExp(escapeRegExp(`${trayDestroy(trayVar)})`), 'g'),
    replace: ({ trayVar }) =>
      `${trayDestroy(trayVar)},await new Promise(r=>setTimeout(r,${timing.trayCleanupDelayMs})))`,
    applied: ({ trayVar }) =>
      `${trayDestroy(trayVar)},await new Promise(r=>setTimeout(r,`,
  },
];

export const findTrayIdentifiers = (
  content: string,
  file = MAIN_INDEX_FILE
): Identifiers =>
  discoverIdentifiers('tray-mutex', content, TRAY_IDENTIFIER_RULES, file);

export interface TrayMutexResult {
  content: string;
  ids: Identifiers;
  applied: string[];
}

export const writeTrayMutex = (
  content: string,
  timing: TrayPatchTiming,
  file = MAIN_INDEX_FILE
): TrayMutexResult => {
  const ids = findTrayIdentifiers(content, file);
  const outcome = applyRewriteRules(
    'tray-mutex',
    file,
    content,
    trayRewriteRules(timing),
    ids
  );
  debug(
    `patch tray-mutex: function=${ids.trayFn}, tray_var=${ids.trayVar}, check_var=${ids.firstConst}`
  );
  return { content: outcome.content, ids, applied: outcome.applied };
};
