import { describe, it, expect } from 'vitest';

import { formatChangelogDate, renderSpecFile } from './specFile';

describe('formatChangelogDate', () => {
  it('uses the rpm changelog date format', () => {
    expect(formatChangelogDate(new Date(2026, 9, 18))).toBe('Sun Oct 18 2026');
    expect(formatChangelogDate(new Date(2026, 0, 5))).toBe('Mon Jan 05 2026');
  });
});

describe('renderSpecFile', () => {
  const lines = renderSpecFile(
    {
      packageName: 'claude-desktop',
      version: '1.1.381',
      arch: 'x86_64',
      maintainer: 'Test Maintainer',
      description: 'Claude Desktop for Linux',
    },
    new Date(2026, 9, 18)
  ).split('\n');

  it('names the package and turns off dependency scanning', () => {
    expect(lines.slice(0, 4)).toEqual([
      'Name:           claude-desktop',
      'Version:        1.1.381',
      'Release:        1%{?dist}',
      'Summary:        Claude Desktop for Linux',
    ]);
    expect(lines).toContain('AutoReq:        no');
    expect(lines).toContain('AutoProv:       no');
    expect(lines).toContain('ExclusiveArch:  x86_64');
  });

  it('fixes chrome-sandbox permissions after install', () => {
    expect(lines).toContain(
      'SANDBOX_PATH="/usr/lib/claude-desktop/node_modules/electron/dist/chrome-sandbox"'
    );
    expect(lines).toContain(
      '    chown root:root "$SANDBOX_PATH" || echo "Warning: Failed to chown chrome-sandbox"'
    );
    expect(lines).toContain(
      '    chmod 4755 "$SANDBOX_PATH" || echo "Warning: Failed to chmod chrome-sandbox"'
    );
  });

  it('lists the installed files', () => {
    const files = lines.slice(
      lines.indexOf('%files') + 1,
      lines.indexOf('%changelog') - 1
    );
    expect(files).toEqual([
      '%defattr(-,root,root,-)',
      '/usr/bin/claude-desktop',
      '/usr/lib/claude-desktop',
      '/usr/share/applications/claude-desktop.desktop',
      '/usr/share/icons/hicolor/*/apps/claude-desktop.png',
    ]);
  });

  it('adds a dated changelog entry from the maintainer', () => {
    expect(lines).toContain('* Sun Oct 18 2026 Test Maintainer - 1.1.381-1');
  });
});
