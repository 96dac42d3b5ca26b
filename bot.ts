#!/usr/bin/env node
import start from './src/index';
import { main } from './src/cli';

if (require.main === module) {
  void main(['start', ...process.argv.slice(2)]);
}

export default start;
