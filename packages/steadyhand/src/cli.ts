#!/usr/bin/env node
// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { createFullProgram } from "./program.js";

await createFullProgram().parseAsync();
