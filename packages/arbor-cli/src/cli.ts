#!/usr/bin/env node
/**
 * Arbor CLI - query HTML documents with CSS selectors
 */

import { Command } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import { runQuery } from './query-command.js';

interface CliOptions {
  text?: boolean;
  first?: boolean;
  count?: boolean;
}

const program = new Command();

program
  .name('arbor')
  .description('Select elements from an HTML document with CSS selectors')
  .version('0.1.0')
  .option('-t, --text', 'Print text content instead of HTML')
  .option('-1, --first', 'Stop after the first match')
  .option('-c, --count', 'Print the number of matches only')
  .argument('<selector>', 'Selector or comma-separated group of selectors')
  .argument('[input]', 'Input HTML file (default: stdin)')
  .action((selector: string, inputFile: string | undefined, options: CliOptions) => {
    try {
      let html: string;
      if (inputFile) {
        if (!fs.existsSync(inputFile)) {
          console.error(`Error: Input file not found: ${inputFile}`);
          process.exit(1);
        }
        html = fs.readFileSync(path.resolve(inputFile), 'utf-8');
      } else {
        html = fs.readFileSync(0, 'utf-8');
      }

      for (const line of runQuery(html, selector, options)) {
        console.log(line);
      }
    } catch (error) {
      if (error instanceof Error) {
        console.error('Error:', error.message);
        if (process.env.DEBUG) {
          console.error(error.stack);
        }
      } else {
        console.error('Error:', String(error));
      }
      process.exit(1);
    }
  });

program.parse();
