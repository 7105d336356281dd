/*!
 * Copyright (c) Microsoft Corporation and contributors. All rights reserved.
 * Licensed under the MIT License.
 */

import { type RenderConfiguration, getRenderConfigurationWithDefaults } from "../../Configuration.js";
import type { Logger } from "../../Logging.js";

/**
 * Log entries recorded by a {@link TestLogger}, by level.
 */
export interface LoggedMessages {
	readonly warning: string[];
	readonly verbose: string[];
}

/**
 * A {@link Logger} that records messages rather than printing them.
 */
export interface TestLogger extends Logger {
	readonly messages: LoggedMessages;
}

export function createTestLogger(): TestLogger {
	const messages: LoggedMessages = {
		warning: [],
		verbose: [],
	};
	const record =
		(entries: string[]) =>
		(message: string | Error): void => {
			entries.push(message instanceof Error ? message.message : message);
		};
	return {
		messages,
		warning: record(messages.warning),
		verbose: record(messages.verbose),
	};
}

/**
 * Complete configuration for tests, logging to the provided (or a new) {@link TestLogger}.
 */
export function createTestConfig(
	logger: TestLogger = createTestLogger(),
	overrides?: Omit<RenderConfiguration, "logger">,
): Required<RenderConfiguration> {
	return getRenderConfigurationWithDefaults({ ...overrides, logger });
}
