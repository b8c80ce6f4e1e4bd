// @twinpane/state - cross-session state store of the twinpane file manager
export {
  DOC_NULL,
  DocArray,
  DocObject,
  deepCopy,
  docBool,
  docNumber,
  docString,
} from './document/value.js';
export type { DocBool, DocNull, DocNumber, DocString, DocValue } from './document/value.js';
export { fromJson, parseDocument, stringifyDocument, toJson } from './document/codec.js';

export { parseLegacyState, readLegacyState } from './legacy/reader.js';
export type { LegacyReadOptions } from './legacy/reader.js';

export {
  PERSIST_CATEGORIES,
  allCategories,
  formatCategories,
  isPersistCategory,
  parseCategories,
} from './persistence/categories.js';
export type { CategorySet, PersistCategory } from './persistence/categories.js';
export { FileMonitor, sameFingerprint, takeFingerprint } from './persistence/fingerprint.js';
export type { Fingerprint } from './persistence/fingerprint.js';
export { loadState } from './persistence/loader.js';
export type { LoadOptions } from './persistence/loader.js';
export { mergeStates } from './persistence/merge.js';
export type { MergeContext } from './persistence/merge.js';
export {
  LEGACY_STATE_FILE_NAME,
  STATE_FILE_NAME,
  StatePersistence,
} from './persistence/manager.js';
export type { StatePersistenceOptions } from './persistence/manager.js';
export { serializeState } from './persistence/serializer.js';

export { AssocList, AssocRegistry, formatRecord, parseCommandList } from './session/assocs.js';
export type { Assoc, AssocKind, AssocRecord, AssocRecordType } from './session/assocs.js';
export { BookmarkError, BookmarkStore } from './session/bookmarks.js';
export type { Bookmark } from './session/bookmarks.js';
export { CommandError, CommandRegistry } from './session/commands.js';
export { DirStack } from './session/dir-stack.js';
export type { DirStackEntry } from './session/dir-stack.js';
export { StringHistory } from './session/history.js';
export { MarkStore, SPECIAL_MARKS, VALID_MARKS, isSpecialMark, isValidMark } from './session/marks.js';
export type { Mark } from './session/marks.js';
export { MatcherError, Matchers, NameFilter } from './session/matchers.js';
export { OPTION_DEFS, OptionError, OptionSet, findOptionDef } from './session/options.js';
export type { OptionDef, OptionErrorCode, OptionScope, OptionType, OptionValue } from './session/options.js';
export { DirHistory, PaneView } from './session/pane.js';
export type { DirHistoryEntry, PaneFilters } from './session/pane.js';
export { RegisterStore, VALID_REGISTERS, isValidRegister } from './session/registers.js';
export { Session } from './session/session.js';
export type { PaneIndex, SessionOptions, SplitOrientation } from './session/session.js';
export {
  DEFAULT_SORT_KEY,
  MAX_SORT_KEY,
  SORT_KEY_SLOTS,
  formatSortDescriptor,
  parseSortDescriptor,
} from './session/sorting.js';
export { TrashStore } from './session/trash.js';
export type { TrashEntry } from './session/trash.js';

export { ConfigError, defaultStateDefaults, loadConfig } from './config.js';
export type { StateConfig, StateDefaults } from './config.js';
export { createStateStore } from './store.js';
export type { StateStore, StateStoreOptions } from './store.js';
