/*!
 * Copyright (c) Microsoft Corporation and contributors. All rights reserved.
 * Licensed under the MIT License.
 */

import type { Logger } from "./Logging.js";

/**
 * Common base interface for configurations that report diagnostics.
 *
 * @public
 */
export interface LoggingConfiguration {
	/**
	 * Receiver of rendering diagnostics.
	 *
	 * @defaultValue {@link defaultConsoleLogger}
	 *
	 * @remarks
	 * Language servers will generally want {@link noopLogger}, or a logger that forwards to the client's log
	 * channel. For details of how inputs were interpreted, use {@link verboseConsoleLogger}.
	 */
	readonly logger?: Logger;
}
