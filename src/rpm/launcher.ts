// The launcher installed as /usr/bin/<package>. It picks display flags at
// startup and logs to $XDG_CACHE_HOME/<package>/launcher.log.

export const WAYLAND_OVERRIDE_VAR = 'CLAUDE_USE_WAYLAND';

/** Passed under Wayland unless native Wayland was asked for. */
export const XWAYLAND_FLAGS = ['--no-sandbox', '--ozone-platform=x11'];

export const NATIVE_WAYLAND_FLAGS = [
  '--no-sandbox',
  '--enable-features=UseOzonePlatform,WaylandWindowDecorations',
  '--ozone-platform=wayland',
  '--enable-wayland-ime',
  '--wayland-text-input-version=3',
];

export const ALWAYS_FLAGS = ['--disable-features=CustomTitlebar'];

const MISSING_ELECTRON_MESSAGE =
  'Claude Desktop cannot start because the Electron framework is missing. ' +
  'Please ensure Electron is installed globally or reinstall Claude Desktop.';

const appendArgs = (flags: string[], indent: string): string =>
  flags.map(flag => `${indent}ELECTRON_ARGS+=("${flag}")`).join('\n');

export const renderLauncher = (packageName: string): string => {
  const appDir = `/usr/lib/${packageName}`;
  return `#!/bin/bash
LOG_DIR="\${XDG_CACHE_HOME:-$HOME/.cache}/${packageName}"
mkdir -p "$LOG_DIR"
LOG_FILE="$LOG_DIR/launcher.log"
echo "--- Claude Desktop Launcher Start ---" > "$LOG_FILE"
echo "Timestamp: $(date)" >> "$LOG_FILE"
echo "Arguments: $@" >> "$LOG_FILE"

export ELECTRON_FORCE_IS_PACKAGED=true

IS_WAYLAND=false
if [ -n "$WAYLAND_DISPLAY" ]; then
  IS_WAYLAND=true
  echo "Wayland detected" >> "$LOG_FILE"
fi

if [ -z "$DISPLAY" ] && [ -z "$WAYLAND_DISPLAY" ]; then
  echo "No display detected (TTY session) - cannot start graphical application" >> "$LOG_FILE"
  echo "Error: Claude Desktop requires a graphical desktop environment." >&2
  echo "Please run from within an X11 or Wayland session, not from a TTY." >&2
  exit 1
fi

USE_X11_ON_WAYLAND=true
if [ "$${WAYLAND_OVERRIDE_VAR}" = "1" ]; then
  USE_X11_ON_WAYLAND=false
  echo "${WAYLAND_OVERRIDE_VAR}=1 set, using native Wayland backend" >> "$LOG_FILE"
  echo "Note: Global hotkeys (quick window) may not work in native Wayland mode" >> "$LOG_FILE"
fi

ELECTRON_EXEC="electron"
LOCAL_ELECTRON_PATH="${appDir}/node_modules/electron/dist/electron"
if [ -f "$LOCAL_ELECTRON_PATH" ]; then
  ELECTRON_EXEC="$LOCAL_ELECTRON_PATH"
  echo "Using local Electron: $ELECTRON_EXEC" >> "$LOG_FILE"
elif command -v electron &> /dev/null; then
  echo "Using global Electron: $ELECTRON_EXEC" >> "$LOG_FILE"
else
  echo "Error: Electron executable not found (checked local $LOCAL_ELECTRON_PATH and global path)." >> "$LOG_FILE"
  if command -v zenity &> /dev/null; then
    zenity --error --text="${MISSING_ELECTRON_MESSAGE}"
  elif command -v kdialog &> /dev/null; then
    kdialog --error "${MISSING_ELECTRON_MESSAGE}"
  fi
  exit 1
fi

APP_PATH="${appDir}/node_modules/electron/dist/resources/app.asar"
ELECTRON_ARGS=("$APP_PATH")

if [ "$IS_WAYLAND" = true ]; then
  if [ "$USE_X11_ON_WAYLAND" = true ]; then
    echo "Using X11 backend via XWayland (for global hotkey support)" >> "$LOG_FILE"
${appendArgs(XWAYLAND_FLAGS, '    ')}
    echo "To use native Wayland instead, set ${WAYLAND_OVERRIDE_VAR}=1" >> "$LOG_FILE"
  else
    echo "Using native Wayland backend" >> "$LOG_FILE"
${appendArgs(NATIVE_WAYLAND_FLAGS, '    ')}
    echo "Warning: Global hotkeys may not work in native Wayland mode" >> "$LOG_FILE"
  fi
else
  echo "X11 session detected" >> "$LOG_FILE"
fi

${appendArgs(ALWAYS_FLAGS, '')}
export ELECTRON_USE_SYSTEM_TITLE_BAR=1

APP_DIR="${appDir}"
echo "Changing directory to $APP_DIR" >> "$LOG_FILE"
cd "$APP_DIR" || { echo "Failed to cd to $APP_DIR" >> "$LOG_FILE"; exit 1; }

echo "Executing: $ELECTRON_EXEC \${ELECTRON_ARGS[*]} $*" >> "$LOG_FILE"
"$ELECTRON_EXEC" "\${ELECTRON_ARGS[@]}" "$@" >> "$LOG_FILE" 2>&1
EXIT_CODE=$?
echo "Electron exited with code: $EXIT_CODE" >> "$LOG_FILE"
echo "--- Claude Desktop Launcher End ---" >> "$LOG_FILE"
exit $EXIT_CODE
`;
};
