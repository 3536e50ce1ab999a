// Small single-anchor fixes to the main process bundle.

import { applyRewriteRules, RewriteRule } from './rules';

/**
 * The quick-entry window keeps keyboard focus after submit unless it is
 * blurred before it hides. Only the first hide() on a variable named `e` is
 * the quick window's; `xe.hide()` and the like are other windows.
 */
export const QUICK_WINDOW_BLUR_RULES: RewriteRule[] = [
  {
    name: 'blur before hide',
    anchor: 'the quick window e.hide() call',
    find: () => /(?<![$\w])e\.hide\(\)/,
    replace: () => 'e.blur(),e.hide()',
    applied: () => /(?<![$\w])e\.blur\(\),e\.hide\(\)/,
    firstOnly: true,
  },
];

const WIN32_CLI_PLATFORM = 'if(process.platform==="win32")return"win32-x64";';
const LINUX_CLI_PLATFORM =
  'if(process.platform==="linux")return process.arch==="arm64"?"linux-arm64":"linux-x64";';

/**
 * The bundled Claude Code download only knows Windows and macOS platform
 * names; add Linux so the in-app installer picks a Linux binary.
 */
export const LINUX_CLI_PLATFORM_RULES: RewriteRule[] = [
  {
    name: 'linux platform branch',
    anchor: 'the win32 Claude Code platform branch',
    find: () => /if\(process\.platform==="win32"\)return"win32-x64";/,
    replace: () => WIN32_CLI_PLATFORM + LINUX_CLI_PLATFORM,
    applied: () => 'process.arch==="arm64"?"linux-arm64":"linux-x64"',
    firstOnly: true,
  },
];

export const writeQuickWindowBlur = (content: string, label = 'bundle'): string =>
  applyRewriteRules('quick-window-blur', label, content, QUICK_WINDOW_BLUR_RULES)
    .content;

export const writeLinuxCliPlatform = (
  content: string,
  label = 'bundle'
): string =>
  applyRewriteRules(
    'linux-cli-platform',
    label,
    content,
    LINUX_CLI_PLATFORM_RULES
  ).content;
