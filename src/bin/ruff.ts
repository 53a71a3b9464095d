#!/usr/bin/env node

// Installed under Ruff's own name; wrapper options take the ruffwrap- prefix.
import { main } from "./main.js";

main("ruff");
