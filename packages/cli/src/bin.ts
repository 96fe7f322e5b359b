#!/usr/bin/env node

import { main } from "./cli";
import { fatal } from "./output";

main(process.argv).catch((err) => {
	fatal(String(err));
});
