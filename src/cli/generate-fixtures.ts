#!/usr/bin/env node
import {
  requestGeneratorConfig,
  responseGeneratorConfig,
} from "../config/generator-config.js";
import { runMain } from "./run.js";

runMain([requestGeneratorConfig(), responseGeneratorConfig()]);
