/**
 * Live state of one file manager instance: two panes plus the
 * subsystems whose content survives between sessions.
 */

import { AssocRegistry } from './assocs.js';
import { BookmarkStore } from './bookmarks.js';
import { CommandRegistry } from './commands.js';
import { DirStack } from './dir-stack.js';
import { StringHistory } from './history.js';
import { MarkStore } from './marks.js';
import { OptionError, OptionSet } from './options.js';
import { PaneView } from './pane.js';
import { RegisterStore } from './registers.js';
import { TrashStore } from './trash.js';

export type PaneIndex = 0 | 1;
export type SplitOrientation = 'v' | 'h';

export interface SessionOptions {
  /** Initial value of the `history` option. */
  historyLength?: number;
  /** Initial value of the `persist` option. */
  persist?: string;
  /** Directory both panes start in. */
  startDir?: string;
}

export class Session {
  readonly options = new OptionSet('global');
  readonly left: PaneView;
  readonly right: PaneView;

  activePane: PaneIndex = 0;
  splitOrientation: SplitOrientation = 'v';
  /** Splitter offset; negative means centred. */
  splitterPos = -1;
  /** 1 when the active pane is expanded over the other. */
  windowCount: 1 | 2 = 2;
  useTermMultiplexer = false;
  colorScheme = '';

  readonly assocs = new AssocRegistry();
  readonly commands = new CommandRegistry();
  readonly marks = new MarkStore();
  readonly bookmarks = new BookmarkStore();
  readonly registers = new RegisterStore();
  readonly dirStack = new DirStack();
  readonly trash = new TrashStore();

  readonly cmdHistory: StringHistory;
  readonly searchHistory: StringHistory;
  readonly promptHistory: StringHistory;
  readonly filterHistory: StringHistory;

  constructor(options?: SessionOptions) {
    if (options?.historyLength !== undefined) {
      this.options.set('history', options.historyLength);
    }
    if (options?.persist !== undefined) {
      this.options.set('persist', options.persist);
    }

    const length = this.historyLength;
    const startDir = options?.startDir ?? '/';
    this.left = new PaneView(startDir, length);
    this.right = new PaneView(startDir, length);
    this.cmdHistory = new StringHistory(length);
    this.searchHistory = new StringHistory(length);
    this.promptHistory = new StringHistory(length);
    this.filterHistory = new StringHistory(length);

    this.options.onChange((name, value) => {
      if (name === 'history' && typeof value === 'number') {
        this.applyHistoryLength(value);
      }
    });
  }

  get historyLength(): number {
    return Math.max(0, this.options.getInt('history') ?? 0);
  }

  /** Resize every directory and string history. */
  resizeHistories(length: number): void {
    this.options.set('history', Math.max(0, length));
  }

  get preview(): boolean {
    return this.options.getBool('quickview');
  }

  set preview(on: boolean) {
    this.options.set('quickview', on);
  }

  /** Comma-separated persistence categories. */
  get persist(): string {
    return this.options.getString('persist') ?? '';
  }

  panes(): [PaneView, PaneView] {
    return [this.left, this.right];
  }

  pane(index: PaneIndex): PaneView {
    return index === 0 ? this.left : this.right;
  }

  histories(): StringHistory[] {
    return [this.cmdHistory, this.searchHistory, this.promptHistory, this.filterHistory];
  }

  /**
   * Apply a setting. Global options go to the session; pane options go
   * to `pane`, or to both panes when none is given. Throws OptionError.
   */
  applySetting(setting: string, pane?: PaneView): void {
    if (this.options.recognizes(setting)) {
      this.options.apply(setting);
      return;
    }
    const targets = pane ? [pane] : this.panes();
    if (!targets[0].options.recognizes(setting)) {
      throw new OptionError('UNKNOWN', `unknown option in: ${setting}`);
    }
    for (const target of targets) {
      target.options.apply(setting);
    }
  }

  private applyHistoryLength(length: number): void {
    const capacity = Math.max(0, length);
    for (const pane of this.panes()) {
      pane.history.resize(capacity);
    }
    for (const history of this.histories()) {
      history.resize(capacity);
    }
  }
}
