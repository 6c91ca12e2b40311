import chalk from "chalk";
import type { Ora } from "ora";
import type { LogCallback } from "@scratchfleet/provisioner";

/**
 * Route provisioner progress into a spinner: stdout lines replace the spinner
 * text, stderr lines are persisted as warnings and the spinner carries on.
 */
export function spinnerLog(spinner: Ora): LogCallback {
  return (line, stream) => {
    if (stream === "stdout") {
      spinner.text = line;
      return;
    }
    const text = spinner.text;
    spinner.warn(chalk.yellow(line));
    spinner.start(text);
  };
}
