import type { Ora } from "ora";
import { spinnerLog } from "./spinner-log";

function fakeSpinner() {
  return { text: "Preparing fleet...", warn: jest.fn(), start: jest.fn() };
}

describe("spinnerLog", () => {
  it("shows stdout lines as the spinner text", () => {
    const spinner = fakeSpinner();
    spinnerLog(spinner as unknown as Ora)("Security group sg-1 created", "stdout");

    expect(spinner.text).toBe("Security group sg-1 created");
    expect(spinner.warn).not.toHaveBeenCalled();
  });

  it("persists stderr lines and resumes with the previous text", () => {
    const spinner = fakeSpinner();
    spinnerLog(spinner as unknown as Ora)("Failed to release eipalloc-1", "stderr");

    expect(spinner.warn).toHaveBeenCalledWith(expect.stringContaining("Failed to release eipalloc-1"));
    expect(spinner.start).toHaveBeenCalledWith("Preparing fleet...");
  });
});
