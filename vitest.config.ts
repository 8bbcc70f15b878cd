// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    include: ["cifti-axes/tests/**/*.spec.ts"],
    environment: "node",
  },
})
