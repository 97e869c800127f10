import { EXIT_FATAL, main, processIO } from "./cli.js";

const controller = new AbortController();
process.once("SIGINT", () => controller.abort());

main(process.argv.slice(2), { ...processIO, signal: controller.signal }).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = EXIT_FATAL;
  },
);
