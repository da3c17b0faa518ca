#!/usr/bin/env node
import { requestGeneratorConfig } from "../config/generator-config.js";
import { runMain } from "./run.js";

runMain([requestGeneratorConfig()]);
