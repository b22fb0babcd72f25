// backend/src/cliMain.ts
import { hideBin } from "yargs/helpers";
import { runCli } from "./cli/index";

runCli(hideBin(process.argv))
  .then(code => {
    process.exitCode = code;
  })
  .catch(e => {
    console.error(e);
    process.exit(1);
  });
