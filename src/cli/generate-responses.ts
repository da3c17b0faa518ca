#!/usr/bin/env node
import { responseGeneratorConfig } from "../config/generator-config.js";
import { runMain } from "./run.js";

runMain([responseGeneratorConfig()]);
