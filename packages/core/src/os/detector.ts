/**
 * OS Detection Module
 * Detects the local operating system; launchd only exists on macOS
 */

import os from 'node:os';
import { OperatingSystem, Architecture } from '../types/common.js';
import type { SystemInfo } from '../types/common.js';

/**
 * Detects operating system and system information
 */
export class OSDetector {
  /**
   * Detect local operating system
   */
  public static detect(): SystemInfo {
    const platform = os.platform();

    return {
      os: this.platformToOS(platform),
      arch: this.detectArchitecture(os.arch()),
      platform,
      release: os.release(),
    };
  }

  /**
   * Convert Node.js platform string to OperatingSystem enum
   */
  public static platformToOS(platform: string): OperatingSystem {
    switch (platform) {
      case 'linux':
        return OperatingSystem.LINUX;
      case 'darwin':
        return OperatingSystem.MACOS;
      case 'win32':
        return OperatingSystem.WINDOWS;
      default:
        return OperatingSystem.UNKNOWN;
    }
  }

  /**
   * Detect architecture from arch string
   */
  private static detectArchitecture(archString: string): Architecture {
    const arch = archString.toLowerCase();

    if (arch === 'x64' || arch === 'amd64' || arch === 'x86_64') {
      return Architecture.X64;
    }
    if (arch === 'arm64' || arch === 'aarch64') {
      return Architecture.ARM64;
    }
    if (arch.startsWith('arm')) {
      return Architecture.ARM;
    }
    if (arch === 'x86' || arch === 'i386' || arch === 'i686') {
      return Architecture.X86;
    }

    return Architecture.UNKNOWN;
  }

  /**
   * Check if current system is macOS
   */
  public static isMacOS(): boolean {
    return os.platform() === 'darwin';
  }

  /**
   * Get a human-readable OS name
   */
  public static getOSName(systemInfo: SystemInfo): string {
    switch (systemInfo.os) {
      case OperatingSystem.LINUX:
        return 'Linux';
      case OperatingSystem.MACOS:
        return 'macOS';
      case OperatingSystem.WINDOWS:
        return 'Windows';
      default:
        return 'Unknown OS';
    }
  }
}
