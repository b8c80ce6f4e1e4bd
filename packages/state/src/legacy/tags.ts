/**
 * Record tags of the legacy line format: the first character of a line
 * says what the rest of it (and of any continuation lines) holds.
 */

export const LineTag = {
  Comment: '#',
  Option: '=',
  Filetype: '.',
  XFiletype: 'x',
  FileViewer: ',',
  Command: '!',
  Mark: '\'',
  Bookmark: 'b',
  ActivePane: 'a',
  QuickView: 'q',
  WindowCount: 'v',
  SplitOrientation: 'o',
  SplitPosition: 'm',
  LeftSort: 'l',
  RightSort: 'r',
  LeftHistory: 'd',
  RightHistory: 'D',
  CmdlineHistory: ':',
  SearchHistory: '/',
  PromptHistory: 'p',
  FilterHistory: '|',
  DirStack: 'S',
  Trash: 't',
  Register: '"',
  LeftFilter: 'f',
  RightFilter: 'F',
  LeftFilterInvert: 'i',
  RightFilterInvert: 'I',
  UseTermMultiplexer: 's',
  ColorScheme: 'c',
  LeftPaneProperty: '[',
  RightPaneProperty: ']',
} as const;

export type LineTag = (typeof LineTag)[keyof typeof LineTag];

/** Second character of a `[`/`]` pane property line. */
export const PaneProperty = {
  DotFiles: '.',
  AutoFilter: 'F',
} as const;

/** Option line prefixes that route the option to one pane. */
export const LEFT_PANE_OPTION = '[';
export const RIGHT_PANE_OPTION = ']';

/**
 * Command of a synthesized builtin association, written as
 * `{description}builtin`. Such entries are not migrated.
 */
export const BUILTIN_COMMAND = 'builtin';
