#!/usr/bin/env node
import { hideBin } from "yargs/helpers";
import { MESSAGES } from "./src/constantes";
import { main } from "./src/main";

main(hideBin(process.argv))
  .finally(() => process.stdin.destroy())
  .catch((err: unknown) => {
    console.error(err);
    console.log(MESSAGES.failed);
    process.exitCode = 1;
  });
