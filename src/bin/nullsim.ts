#!/usr/bin/env node
import { runDefaultCLI } from "../cli/RunTestCLI.ts";

runDefaultCLI();
