#!/usr/bin/env node
import { runApp } from './app/app';

process.exitCode = runApp(process.argv.slice(2), process.env, text => console.log(text));
