#!/usr/bin/env tsx
import { hideBin } from "yargs/helpers";
import { main } from "./index";

process.exitCode = await main(hideBin(process.argv));
