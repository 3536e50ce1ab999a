export interface SpecFileParams {
  packageName: string;
  version: string;
  arch: string;
  maintainer: string;
  description: string;
}

const DAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];
const MONTHS = [
  'Jan',
  'Feb',
  'Mar',
  'Apr',
  'May',
  'Jun',
  'Jul',
  'Aug',
  'Sep',
  'Oct',
  'Nov',
  'Dec',
];

/**
 * `%changelog` dates look like `Sun Oct 18 2026`.
 */
export const formatChangelogDate = (date: Date): string =>
  [
    DAYS[date.getDay()],
    MONTHS[date.getMonth()],
    String(date.getDate()).padStart(2, '0'),
    date.getFullYear(),
  ].join(' ');

/**
 * The package manifest. The tree under BUILDROOT is already laid out, so
 * `%install` has nothing to do and dependency scanning is off: the bundled
 * Electron carries its own libraries.
 */
export const renderSpecFile = (
  params: SpecFileParams,
  date: Date = new Date()
): string => {
  const { packageName, version, arch, maintainer, description } = params;
  const libDir = `/usr/lib/${packageName}`;
  return `Name:           ${packageName}
Version:        ${version}
Release:        1%{?dist}
Summary:        ${description}

License:        Proprietary
URL:            https://claude.ai

AutoReq:        no
AutoProv:       no

ExclusiveArch:  ${arch}

%description
Claude is an AI assistant from Anthropic.
This package provides the desktop interface for Claude.

Supported on Fedora, RHEL, CentOS, and other RPM-based Linux distributions.

%install
# Files are pre-staged in the buildroot

%post
update-desktop-database /usr/share/applications &> /dev/null || true

SANDBOX_PATH="${libDir}/node_modules/electron/dist/chrome-sandbox"
if [ -f "$SANDBOX_PATH" ]; then
    echo "Setting chrome-sandbox permissions..."
    chown root:root "$SANDBOX_PATH" || echo "Warning: Failed to chown chrome-sandbox"
    chmod 4755 "$SANDBOX_PATH" || echo "Warning: Failed to chmod chrome-sandbox"
fi

%files
%defattr(-,root,root,-)
/usr/bin/${packageName}
${libDir}
/usr/share/applications/${packageName}.desktop
/usr/share/icons/hicolor/*/apps/${packageName}.png

%changelog
* ${formatChangelogDate(date)} ${maintainer} - ${version}-1
- Initial RPM package for Claude Desktop
`;
};
