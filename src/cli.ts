#!/usr/bin/env node
import { runMain } from "@reliverse/rempts";

import { main } from "./command.js";

await runMain(main);
