import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { classifyEntries } from "../../src/shell/fixtures.js"

describe("classifyEntries", () => {
  it.effect("sorts fixtures and sets aside other files", () =>
    Effect.sync(() => {
      expect(classifyEntries(["y_a.json", "expectations.json", "README.md", "n_b.json", "i_c.json", "y_d.txt"]))
        .toEqual({
          fixtures: [
            { file: "i_c.json", kind: "implementation-defined" },
            { file: "n_b.json", kind: "reject" },
            { file: "y_a.json", kind: "accept" }
          ],
          skipped: ["README.md", "y_d.txt"]
        })
    }))
})
