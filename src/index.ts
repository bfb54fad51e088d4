#!/usr/bin/env node

import dotenv from "dotenv";
import { createProgram } from "./cli.js";

dotenv.config();

await createProgram().parseAsync();
