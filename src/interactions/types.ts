/**
 * Interaction System Types
 *
 * Defines the terminal interaction primitives the screens are written
 * against, and the module contract the navigator dispatches to.
 *
 * - Renderer: select / input / confirm / progress / display
 * - NavigationModule: a unit owning a set of screens
 * - NavigationContext: the shared credential and client handle
 *
 * @module interactions/types
 */

import type { TavusApi } from '../core/api-client.js';

// ============================================================================
// Interaction Primitives
// ============================================================================

/**
 * Option for select interactions
 */
export interface SelectOption {
  /** Unique identifier for this option, returned when it is chosen */
  id: string;
  /** Display label */
  label: string;
  /** Optional icon/emoji */
  icon?: string;
  /** Optional description (shown dimmed) */
  description?: string;
  /** Rendered as a non-selectable separator line */
  separator?: boolean;
}

/**
 * Select interaction - user picks one option from a list
 */
export interface SelectInteraction {
  /** Prompt message */
  message: string;
  /** Available options; ids must be unique */
  options: SelectOption[];
}

/**
 * Input interaction - user enters text
 */
export interface InputInteraction {
  /** Prompt message */
  message: string;
  /** Placeholder/default value */
  placeholder?: string;
  /** Hide typed characters */
  mask?: boolean;
  /** Validation function - returns error message or null */
  validate?: (value: string) => string | null;
}

/**
 * Confirm interaction - yes/no choice
 */
export interface ConfirmInteraction {
  /** Prompt message */
  message: string;
  /** Whether this is a destructive action (defaults to "no") */
  destructive?: boolean;
}

/**
 * Progress interaction - busy indicator around a blocking call
 */
export interface ProgressInteraction {
  /** Loading message */
  message: string;
}

export type DisplayFormat = 'heading' | 'plain' | 'info' | 'success' | 'warning' | 'error';

/**
 * Display interaction - show message to user
 */
export interface DisplayInteraction {
  /** Message to display (may span several lines) */
  message: string;
  /** Message type affects styling */
  format?: DisplayFormat;
}

/**
 * Handle for controlling progress indicator
 */
export interface ProgressHandle {
  /** Update the progress message */
  update(message: string): void;
  /** Mark as success and stop */
  succeed(message?: string): void;
  /** Mark as failure and stop */
  fail(message?: string): void;
  /** Stop without status */
  stop(): void;
}

/**
 * Terminal renderer interface
 *
 * Cancellation is an ordinary outcome: select and input resolve to null,
 * confirm resolves to false.
 */
export interface Renderer {
  /**
   * Render a select interaction
   * @returns Selected option ID, or null if cancelled
   */
  select(interaction: SelectInteraction): Promise<string | null>;

  /**
   * Render an input interaction
   * @returns User input, or null if cancelled
   */
  input(interaction: InputInteraction): Promise<string | null>;

  /**
   * Render a confirm interaction
   * @returns true if confirmed, false if declined or cancelled
   */
  confirm(interaction: ConfirmInteraction): Promise<boolean>;

  /**
   * Start a progress indicator
   */
  progress(interaction: ProgressInteraction): ProgressHandle;

  /**
   * Display a message
   */
  display(interaction: DisplayInteraction): Promise<void>;

  /**
   * Block until the operator acknowledges
   */
  waitForEnter(message?: string): Promise<void>;
}

// ============================================================================
// Navigation
// ============================================================================

/**
 * Token naming one state of the navigator
 */
export type ScreenId = string;

/**
 * Screens every navigator understands without a module
 */
export const ReservedScreens = {
  MainMenu: 'main_menu',
  Exit: 'exit',
} as const;

export type ReservedScreen = (typeof ReservedScreens)[keyof typeof ReservedScreens];

export function isReservedScreen(screen: ScreenId): screen is ReservedScreen {
  return screen === ReservedScreens.MainMenu || screen === ReservedScreens.Exit;
}

/**
 * The only state shared between modules. Written by the API key module,
 * read by everyone else.
 */
export interface NavigationContext {
  /** Active API credential */
  apiKey: string | null;
  /** Client bound to the active credential */
  client: TavusApi | null;
}

/**
 * Entry a module contributes to the main menu
 */
export interface MenuEntry {
  label: string;
  screen: ScreenId;
  icon?: string;
  description?: string;
}

/**
 * Pluggable unit of functionality
 */
export interface NavigationModule {
  /** Unique module name */
  readonly name: string;
  /** Screens this module handles (non-empty) */
  readonly screens: readonly ScreenId[];
  /** Main menu contributions, in display order */
  readonly menuEntries: readonly MenuEntry[];

  /**
   * Run one screen
   * @returns The next screen to show
   */
  execute(screen: ScreenId, context: NavigationContext): Promise<ScreenId>;

  /**
   * Optional warm-up run once before the navigation loop starts
   */
  prepare?(context: NavigationContext): Promise<void>;
}
