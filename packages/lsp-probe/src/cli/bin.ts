#!/usr/bin/env node
/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { getErrorMessage } from '../errors.js';
import { main } from './main.js';

main().catch((error: unknown) => {
  console.error(getErrorMessage(error));
  process.exit(1);
});
