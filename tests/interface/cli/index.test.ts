import { afterEach, describe, expect, it, vi } from "vitest";

const runMock = vi.fn();

vi.mock("../../../src/cli/run", () => ({
  runCli: runMock,
}));

afterEach(() => {
  vi.restoreAllMocks();
  runMock.mockReset();
});

describe("entry point", () => {
  it("logs and exits when the CLI promise rejects", async () => {
    const failure = new Error("boom");
    runMock.mockRejectedValue(failure);

    const errorSpy = vi
      .spyOn(console, "error")
      .mockImplementation(() => undefined);
    const exitSpy = vi
      .spyOn(process, "exit")
      .mockImplementation((() => undefined) as never);

    await import("../../../src/index");

    await vi.waitFor(() => {
      expect(exitSpy).toHaveBeenCalledWith(1);
    });
    expect(errorSpy).toHaveBeenCalledWith("Failed to start chord dictionary server", failure);
    expect(runMock).toHaveBeenCalledTimes(1);
  });
});
