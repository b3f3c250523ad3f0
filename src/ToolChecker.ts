/**
 * Utility for locating and checking the required tools (adb, scrcpy)
 * and providing platform-specific installation instructions.
 */

import { execFile } from 'child_process';
import * as path from 'path';

export type ToolName = 'adb' | 'scrcpy';

export interface ToolStatus {
  isAvailable: boolean;
  path: string;
  version?: string;
  error?: string;
}

export interface ToolCheckResult {
  adb: ToolStatus;
  scrcpy: ToolStatus;
  allAvailable: boolean;
}

export interface InstallInstructions {
  platform: 'darwin' | 'linux' | 'win32';
  adb: {
    command: string;
    url: string;
  };
  scrcpy: {
    command: string;
    url: string;
  };
  notes: string[];
}

// Cache for tool check results
let cachedResult: ToolCheckResult | null = null;
let cacheKey = '';
let cacheTimestamp = 0;
const CACHE_TTL_MS = 60000; // 1 minute

/**
 * Path of a tool inside a custom directory, or the bare name for a PATH lookup
 */
export function resolveExecutable(
  name: ToolName,
  customDir?: string,
  platform: NodeJS.Platform = process.platform
): string {
  if (!customDir) {
    return name;
  }
  const fileName = platform === 'win32' ? `${name}.exe` : name;
  return path.join(customDir, fileName);
}

function checkTool(
  command: string,
  args: string[],
  versionPattern: RegExp
): Promise<ToolStatus> {
  return new Promise((resolve) => {
    execFile(command, args, { timeout: 5000, windowsHide: true }, (error, stdout) => {
      if (error) {
        resolve({
          isAvailable: false,
          path: command,
          error: error.message,
        });
        return;
      }

      const match = stdout.match(versionPattern);
      resolve({
        isAvailable: true,
        path: command,
        version: match ? match[1] : undefined,
      });
    });
  });
}

/**
 * Check if ADB is available
 */
export async function checkAdb(customDir?: string): Promise<ToolStatus> {
  // "Android Debug Bridge version 34.0.5"
  return checkTool(
    resolveExecutable('adb', customDir),
    ['version'],
    /Android Debug Bridge version (\d+\.\d+\.\d+)/
  );
}

/**
 * Check if scrcpy is available
 */
export async function checkScrcpy(customDir?: string): Promise<ToolStatus> {
  // "scrcpy 3.3.3 <https://...>"
  return checkTool(
    resolveExecutable('scrcpy', customDir),
    ['--version'],
    /scrcpy\s+(\d+\.\d+(?:\.\d+)?)/
  );
}

/**
 * Check all required tools
 */
export async function checkAllTools(adbDir?: string, scrcpyDir?: string): Promise<ToolCheckResult> {
  const now = Date.now();
  const key = `${adbDir ?? ''}|${scrcpyDir ?? ''}`;
  if (cachedResult && key === cacheKey && now - cacheTimestamp < CACHE_TTL_MS) {
    return cachedResult;
  }

  const [adb, scrcpy] = await Promise.all([checkAdb(adbDir), checkScrcpy(scrcpyDir)]);

  const result: ToolCheckResult = {
    adb,
    scrcpy,
    allAvailable: adb.isAvailable && scrcpy.isAvailable,
  };

  cachedResult = result;
  cacheKey = key;
  cacheTimestamp = now;

  return result;
}

/**
 * Get platform-specific installation instructions
 */
export function getInstallInstructions(
  platform: NodeJS.Platform = process.platform
): InstallInstructions {
  const adbUrl = 'https://developer.android.com/studio/releases/platform-tools';
  const scrcpyUrl = 'https://github.com/Genymobile/scrcpy';

  switch (platform) {
    case 'darwin':
      return {
        platform: 'darwin',
        adb: { command: 'brew install android-platform-tools', url: adbUrl },
        scrcpy: { command: 'brew install scrcpy', url: scrcpyUrl },
        notes: ['Enable developer mode on the Quest and connect it over USB'],
      };

    case 'linux':
      return {
        platform: 'linux',
        adb: { command: 'sudo apt install adb', url: adbUrl },
        scrcpy: { command: 'sudo apt install scrcpy', url: scrcpyUrl },
        notes: [
          'Fedora: sudo dnf install scrcpy android-tools',
          'Arch: sudo pacman -S scrcpy android-tools',
          'Enable developer mode on the Quest and connect it over USB',
        ],
      };

    case 'win32':
    default:
      return {
        platform: 'win32',
        adb: { command: 'scoop install adb', url: adbUrl },
        scrcpy: { command: 'scoop install scrcpy', url: scrcpyUrl },
        notes: [
          'Install the Oculus ADB drivers',
          'Enable developer mode on the Quest and connect it over USB',
        ],
      };
  }
}

/**
 * Clear the cached tool check results
 * Call this when settings change to force a re-check
 */
export function clearCache(): void {
  cachedResult = null;
  cacheKey = '';
  cacheTimestamp = 0;
}

/**
 * Format a user-friendly message listing missing tools
 */
export function formatMissingToolsMessage(result: ToolCheckResult): string {
  const missing: string[] = [];
  if (!result.adb.isAvailable) {
    missing.push('ADB');
  }
  if (!result.scrcpy.isAvailable) {
    missing.push('scrcpy');
  }
  return missing.join(' and ');
}
