import { beforeAll, afterAll, afterEach, vi } from "vitest";
import { setupServer } from "msw/node";

process.env.NODE_ENV = "test";
process.env.VITEST = "true";

// Keep test output readable; the code under test logs every operation.
vi.spyOn(console, "error").mockImplementation(() => {});
vi.spyOn(console, "warn").mockImplementation(() => {});
vi.spyOn(console, "log").mockImplementation(() => {});

export const server = setupServer();

beforeAll(() => {
  server.listen({ onUnhandledRequest: "error" });
});

afterEach(() => {
  server.resetHandlers();
  vi.clearAllMocks();
});

afterAll(() => {
  server.close();
});
