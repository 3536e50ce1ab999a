export const renderDesktopEntry = (packageName: string): string => `[Desktop Entry]
Name=Claude
Exec=/usr/bin/${packageName} %u
Icon=${packageName}
Type=Application
Terminal=false
Categories=Office;Utility;
MimeType=x-scheme-handler/claude;
StartupWMClass=Claude
`;
