/**
 * Shell command surface of the hub: `enabled`, `refresh`, `clear-data`, `help`
 */

import {
  RefreshReason,
  SafetyHubError,
  UserProfileGroup,
  createUserProfileGroup,
  logError
} from '../types/index.js';

/**
 * The part of the orchestrator the shell drives
 */
export interface ShellTarget {
  isEnabled(): boolean;
  refreshSources(reason: RefreshReason, userProfileGroup: UserProfileGroup): string;
  clearAllData(): void;
}

export interface ShellOutput {
  out(line: string): void;
  err(line: string): void;
}

const consoleOutput: ShellOutput = {
  out: line => console.log(line),
  err: line => console.error(line)
};

const SHELL_REFRESH_REASONS: ReadonlyMap<string, RefreshReason> = new Map<string, RefreshReason>([
  ['PAGE_OPEN', 'page_open'],
  ['BUTTON_CLICK', 'rescan_button'],
  ['REBOOT', 'device_reboot'],
  ['LOCALE_CHANGE', 'locale_change'],
  ['SAFETY_CENTER_ENABLED', 'feature_enabled'],
  ['OTHER', 'other']
]);

const HELP_LINES = [
  'Safety hub commands:',
  '  help or -h',
  '      Print this help text.',
  '  enabled',
  '      Print whether the hub is enabled. Exits with 0 if enabled, 1 otherwise.',
  '  refresh [--reason REASON] [--user USERID]',
  '      Start a refresh of all sources.',
  `      REASON is one of ${Array.from(SHELL_REFRESH_REASONS.keys()).join(', ')}; default OTHER.`,
  '      USERID is the user to refresh for; default 0.',
  '  clear-data',
  '      Clear all reports, dismissals and the refresh in progress.'
];

interface RefreshOptions {
  reason: RefreshReason;
  userId: number;
}

export class ShellCommandHandler {
  constructor(
    private target: ShellTarget,
    private output: ShellOutput = consoleOutput,
    private resolveGroup: (userId: number) => UserProfileGroup = userId => createUserProfileGroup(userId)
  ) {}

  /**
   * Runs one command; returns its exit code
   */
  run(args: string[]): number {
    const command: string | undefined = args[0];
    const rest = args.slice(1);
    try {
      switch (command) {
        case undefined:
        case 'help':
        case '-h':
          this.printHelp();
          return 0;
        case 'enabled':
          return this.enabled();
        case 'refresh':
          return this.refresh(rest);
        case 'clear-data':
          this.target.clearAllData();
          return 0;
        default:
          this.output.err(`Unknown command: ${command}`);
          this.printHelp();
          return 1;
      }
    } catch (error) {
      if (error instanceof SafetyHubError) {
        this.output.err(error.message);
        return 1;
      }
      logError(error, { component: 'ShellCommandHandler', command });
      throw error;
    }
  }

  private enabled(): number {
    const enabled = this.target.isEnabled();
    this.output.out(String(enabled));
    return enabled ? 0 : 1;
  }

  private refresh(args: string[]): number {
    const options = this.parseRefreshOptions(args);
    if (options === undefined) {
      return 1;
    }
    const sessionId = this.target.refreshSources(options.reason, this.resolveGroup(options.userId));
    this.output.out(`Started refresh ${sessionId}`);
    return 0;
  }

  private parseRefreshOptions(args: string[]): RefreshOptions | undefined {
    const options: RefreshOptions = { reason: 'other', userId: 0 };
    for (let i = 0; i < args.length; i++) {
      const option = args[i];
      const value: string | undefined = args[i + 1];
      switch (option) {
        case '--reason': {
          const reason = value === undefined ? undefined : SHELL_REFRESH_REASONS.get(value);
          if (reason === undefined) {
            this.output.err(`Invalid --reason: ${value ?? '(missing)'}`);
            return undefined;
          }
          options.reason = reason;
          i++;
          break;
        }
        case '--user': {
          if (value === undefined || !/^\d+$/.test(value)) {
            this.output.err(`Invalid --user: ${value ?? '(missing)'}`);
            return undefined;
          }
          options.userId = Number(value);
          i++;
          break;
        }
        default:
          this.output.err(`Unknown option: ${option}`);
          return undefined;
      }
    }
    return options;
  }

  private printHelp(): void {
    for (const line of HELP_LINES) {
      this.output.out(line);
    }
  }
}
