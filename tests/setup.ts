import { afterAll, beforeAll, vi } from "vitest";

const consoleMethods = ["debug", "info", "warn", "error"] as const;

// Queue loggers write through console; keep test output readable.
beforeAll(() => {
  for (const method of consoleMethods) {
    vi.spyOn(console, method).mockImplementation(() => undefined);
  }
});

afterAll(() => {
  vi.restoreAllMocks();
});
