#!/usr/bin/env node
import { run } from "./index.js";

run();
