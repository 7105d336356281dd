/*!
 * Copyright (c) Microsoft Corporation and contributors. All rights reserved.
 * Licensed under the MIT License.
 */

import { NewlineKind } from "@rushstack/node-core-library";
import { expect } from "chai";

import { defaultRenderConfiguration, getRenderConfigurationWithDefaults } from "../Configuration.js";
import { defaultConsoleLogger, noopLogger } from "../Logging.js";

describe("getRenderConfigurationWithDefaults", () => {
	it("Fills in defaults", () => {
		expect(getRenderConfigurationWithDefaults()).to.deep.equal({
			logger: defaultConsoleLogger,
			newlineKind: NewlineKind.Lf,
			maxNestingDepth: 64,
			maxMarkupDepth: 64,
		});
	});

	it("Prefers provided values", () => {
		const config = getRenderConfigurationWithDefaults({
			logger: noopLogger,
			maxMarkupDepth: 8,
		});
		expect(config).to.deep.equal({
			...defaultRenderConfiguration,
			logger: noopLogger,
			maxMarkupDepth: 8,
		});
	});
});
