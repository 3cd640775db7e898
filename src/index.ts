#!/usr/bin/env node
import { main } from './main';

main(process.argv.slice(2), process.env)
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error(err);
    process.exit(1);
  });
