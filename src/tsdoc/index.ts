/*!
 * Copyright (c) Microsoft Corporation and contributors. All rights reserved.
 * Licensed under the MIT License.
 */

export { convertTsdocComment } from "./TsdocAdapter.js";
