/*!
 * Copyright (c) Microsoft Corporation and contributors. All rights reserved.
 * Licensed under the MIT License.
 */

import chalk from "chalk";

/**
 * Function signature for logging a rendering diagnostic.
 *
 * @public
 */
export type LoggingFunction = (message: string | Error, ...parameters: unknown[]) => void;

/**
 * Receiver of the diagnostics produced while rendering documentation.
 *
 * @remarks Rendering never fails on bad input. Problems are reported here, and rendering continues.
 *
 * @public
 */
export interface Logger {
	/**
	 * Logs a recoverable problem with the input, such as a malformed inline tag or markup that could not be
	 * converted. The affected text is rendered as-is.
	 */
	warning: LoggingFunction;

	/**
	 * Logs a detail of how the input was interpreted (e.g. an unrecognized block tag rendered as raw text).
	 * If verbose logging is not wanted, this may no-op.
	 */
	verbose: LoggingFunction;
}

function noop(): void {}

/**
 * Default logger. Writes warnings to standard error, and discards verbose messages.
 *
 * @remarks Standard output is left alone, since editor integrations commonly use it as their protocol channel.
 *
 * @public
 */
export const defaultConsoleLogger: Logger = {
	warning: logWarningToConsole,
	verbose: noop,
};

/**
 * {@link defaultConsoleLogger}, but with verbose messages written to standard error as well.
 *
 * @public
 */
export const verboseConsoleLogger: Logger = {
	...defaultConsoleLogger,
	verbose: logVerboseToConsole,
};

/**
 * Logger that discards everything.
 *
 * @public
 */
export const noopLogger: Logger = {
	warning: noop,
	verbose: noop,
};

/**
 * Logs a warning message to standard error, prefixed with "WARNING: " in yellow.
 */
function logWarningToConsole(message: string | Error, ...parameters: unknown[]): void {
	console.error(`${chalk.yellow("WARNING")}: ${formatMessage(message)}`, ...parameters);
}

/**
 * Logs a verbose message to standard error, dimmed.
 */
function logVerboseToConsole(message: string | Error, ...parameters: unknown[]): void {
	console.error(chalk.dim(formatMessage(message)), ...parameters);
}

function formatMessage(message: string | Error): string {
	return message instanceof Error ? message.message : message;
}
