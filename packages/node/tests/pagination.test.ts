/**
 * Tests for the page envelope.
 */

import { describe, it, expect } from "vitest";
import { paginate } from "@cardflow/reports";
import { toPaginatedResponse } from "../src/types/pagination.js";

describe("toPaginatedResponse", () => {
  it("splits items from the page metadata", () => {
    const page = paginate(["a", "b", "c"], { page: 2, pageSize: 2 }, 50);

    expect(toPaginatedResponse(page)).toEqual({
      data: ["c"],
      pagination: { page: 2, pageSize: 2, totalItems: 3, totalPages: 2 },
    });
  });

  it("reports one empty page for an empty list", () => {
    expect(toPaginatedResponse(paginate([], {}, 50))).toEqual({
      data: [],
      pagination: { page: 1, pageSize: 50, totalItems: 0, totalPages: 1 },
    });
  });
});
