/**
 * Tracker action types.
 * All tracker mutations are expressed as serializable actions.
 */

import type { CaretEntry, CaretSelection, RangePlacement } from './state.ts';

// =============================================================================
// Edit Actions
// =============================================================================

/**
 * An edit applied to the underlying document: `erasedLength` units at
 * `position` were replaced with `insertedLength` new ones.
 * Forwarded to the range registry and the segment map.
 */
export interface ApplyEditAction {
  readonly type: 'APPLY_EDIT';
  readonly position: number;
  readonly erasedLength: number;
  readonly insertedLength: number;
}

// =============================================================================
// Caret Actions
// =============================================================================

/**
 * Add a caret, merging it with the carets it overlaps.
 */
export interface AddCaretAction<C> {
  readonly type: 'ADD_CARET';
  readonly selection: CaretSelection;
  readonly data: C;
}

/**
 * Remove the caret at an index.
 */
export interface RemoveCaretAction {
  readonly type: 'REMOVE_CARET';
  readonly index: number;
}

/**
 * Reset to a single caret at the start of the document.
 */
export interface ResetCaretsAction {
  readonly type: 'RESET_CARETS';
}

/**
 * Replace all carets.
 */
export interface SetCaretsAction<C> {
  readonly type: 'SET_CARETS';
  readonly carets: readonly CaretEntry<C>[];
}

// =============================================================================
// Range Actions
// =============================================================================

/**
 * Register an overlapping range (decoration, diagnostic, ...).
 */
export interface InsertRangeAction<R> {
  readonly type: 'INSERT_RANGE';
  readonly start: number;
  readonly length: number;
  readonly value: R;
  /** Order among ranges with the same start (default: 'after') */
  readonly placement?: RangePlacement;
}

/**
 * Remove the range at an index.
 */
export interface EraseRangeAction {
  readonly type: 'ERASE_RANGE';
  readonly index: number;
}

/**
 * Remove every range.
 */
export interface ClearRangesAction {
  readonly type: 'CLEAR_RANGES';
}

// =============================================================================
// Segment Actions
// =============================================================================

/**
 * Set positions [start, end) to a value.
 */
export interface SetSegmentAction<S> {
  readonly type: 'SET_SEGMENT';
  readonly start: number;
  readonly end: number;
  readonly value: S;
}

/**
 * Drop every segment; all positions take `value`.
 */
export interface ClearSegmentsAction<S> {
  readonly type: 'CLEAR_SEGMENTS';
  readonly value: S;
}

// =============================================================================
// Transaction Actions
// =============================================================================

/**
 * Start a transaction (batched changes).
 */
export interface TransactionStartAction {
  readonly type: 'TRANSACTION_START';
}

/**
 * Commit a transaction.
 * Notifies listeners once the outermost transaction completes.
 */
export interface TransactionCommitAction {
  readonly type: 'TRANSACTION_COMMIT';
}

/**
 * Rollback a transaction.
 * Discards all changes since the matching TRANSACTION_START.
 */
export interface TransactionRollbackAction {
  readonly type: 'TRANSACTION_ROLLBACK';
}

// =============================================================================
// Union Type
// =============================================================================

/**
 * All possible tracker actions.
 */
export type TrackerAction<C, R, S> =
  | ApplyEditAction
  | AddCaretAction<C>
  | RemoveCaretAction
  | ResetCaretsAction
  | SetCaretsAction<C>
  | InsertRangeAction<R>
  | EraseRangeAction
  | ClearRangesAction
  | SetSegmentAction<S>
  | ClearSegmentsAction<S>
  | TransactionStartAction
  | TransactionCommitAction
  | TransactionRollbackAction;

/**
 * Extract the action type string from an action.
 */
export type TrackerActionType = TrackerAction<unknown, unknown, unknown>['type'];

// =============================================================================
// Action Type Guards
// =============================================================================

/**
 * Check if an action changes carets.
 */
export function isCaretAction<C, R, S>(
  action: TrackerAction<C, R, S>
): action is AddCaretAction<C> | RemoveCaretAction | ResetCaretsAction | SetCaretsAction<C> {
  return (
    action.type === 'ADD_CARET' ||
    action.type === 'REMOVE_CARET' ||
    action.type === 'RESET_CARETS' ||
    action.type === 'SET_CARETS'
  );
}

/**
 * Check if an action is a transaction action.
 */
export function isTransactionAction<C, R, S>(
  action: TrackerAction<C, R, S>
): action is TransactionStartAction | TransactionCommitAction | TransactionRollbackAction {
  return (
    action.type === 'TRANSACTION_START' ||
    action.type === 'TRANSACTION_COMMIT' ||
    action.type === 'TRANSACTION_ROLLBACK'
  );
}

// =============================================================================
// Action Validation
// =============================================================================

/**
 * Result of validating an action.
 */
export interface ActionValidationResult {
  /** Whether the action is valid */
  readonly valid: boolean;
  /** Error messages if validation failed */
  readonly errors: readonly string[];
}

function checkPosition(
  fields: ReadonlyMap<string, unknown>,
  type: string,
  name: string,
  errors: string[]
): number | null {
  const value = fields.get(name);
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    errors.push(`${type} action requires a numeric "${name}" property`);
    return null;
  }
  if (value < 0) {
    errors.push(`${type} ${name} cannot be negative: ${value}`);
    return null;
  }
  return value;
}

function checkIndex(fields: ReadonlyMap<string, unknown>, type: string, errors: string[]): void {
  const index = checkPosition(fields, type, 'index', errors);
  if (index !== null && !Number.isInteger(index)) {
    errors.push(`${type} index must be an integer: ${index}`);
  }
}

function checkSelection(value: unknown, label: string, errors: string[]): void {
  if (typeof value !== 'object' || value === null) {
    errors.push(`${label} must be an object with begin, length and caretOffset`);
    return;
  }
  const fields = new Map<string, unknown>(Object.entries(value));
  checkPosition(fields, label, 'begin', errors);
  const length = checkPosition(fields, label, 'length', errors);
  const caretOffset = checkPosition(fields, label, 'caretOffset', errors);
  if (length !== null && caretOffset !== null && caretOffset > length) {
    errors.push(`${label} caretOffset (${caretOffset}) cannot exceed length (${length})`);
  }
}

/**
 * Validate an action with detailed error messages.
 *
 * @example
 * ```typescript
 * const result = validateAction(JSON.parse(message));
 * if (!result.valid) {
 *   console.error('Invalid action:', result.errors);
 * }
 * ```
 */
export function validateAction(value: unknown): ActionValidationResult {
  const errors: string[] = [];

  if (typeof value !== 'object' || value === null) {
    errors.push('Action must be a non-null object');
    return { valid: false, errors };
  }

  const fields = new Map<string, unknown>(Object.entries(value));
  const type = fields.get('type');
  if (typeof type !== 'string') {
    errors.push('Action must have a string "type" property');
    return { valid: false, errors };
  }

  switch (type) {
    case 'APPLY_EDIT':
      checkPosition(fields, type, 'position', errors);
      checkPosition(fields, type, 'erasedLength', errors);
      checkPosition(fields, type, 'insertedLength', errors);
      break;

    case 'ADD_CARET':
      checkSelection(fields.get('selection'), 'ADD_CARET selection', errors);
      if (!fields.has('data')) {
        errors.push('ADD_CARET action requires a "data" property');
      }
      break;

    case 'SET_CARETS': {
      const carets = fields.get('carets');
      if (!Array.isArray(carets)) {
        errors.push('SET_CARETS action requires an array "carets" property');
      } else {
        carets.forEach((caret: unknown, i: number) => checkSelection(caret, `SET_CARETS carets[${i}]`, errors));
      }
      break;
    }

    case 'REMOVE_CARET':
    case 'ERASE_RANGE':
      checkIndex(fields, type, errors);
      break;

    case 'INSERT_RANGE': {
      checkPosition(fields, type, 'start', errors);
      checkPosition(fields, type, 'length', errors);
      if (!fields.has('value')) {
        errors.push('INSERT_RANGE action requires a "value" property');
      }
      const placement = fields.get('placement');
      if (placement !== undefined && placement !== 'before' && placement !== 'after') {
        errors.push(`INSERT_RANGE placement must be "before" or "after": ${String(placement)}`);
      }
      break;
    }

    case 'SET_SEGMENT': {
      const start = checkPosition(fields, type, 'start', errors);
      const end = checkPosition(fields, type, 'end', errors);
      if (start !== null && end !== null && start > end) {
        errors.push(`SET_SEGMENT start (${start}) cannot be greater than end (${end})`);
      }
      if (!fields.has('value')) {
        errors.push('SET_SEGMENT action requires a "value" property');
      }
      break;
    }

    case 'CLEAR_SEGMENTS':
      if (!fields.has('value')) {
        errors.push('CLEAR_SEGMENTS action requires a "value" property');
      }
      break;

    case 'RESET_CARETS':
    case 'CLEAR_RANGES':
    case 'TRANSACTION_START':
    case 'TRANSACTION_COMMIT':
    case 'TRANSACTION_ROLLBACK':
      // These actions have no additional properties to validate
      break;

    default:
      errors.push(`Unknown action type: "${type}"`);
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Check if an unknown value is a structurally valid tracker action.
 * Payload types (caret data, range and segment values) are not checked.
 */
export function isTrackerAction(value: unknown): value is TrackerAction<unknown, unknown, unknown> {
  return validateAction(value).valid;
}
