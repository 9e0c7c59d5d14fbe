#!/usr/bin/env node
import { main } from "./cli";

main(process.argv).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error("Fatal error:", err);
    process.exitCode = 2;
  },
);
