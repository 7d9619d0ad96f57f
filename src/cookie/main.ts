#!/usr/bin/env node
import { argv, env, stdout } from 'node:process';
import { run } from './app.js';

// メイン処理
const main = async () => {
  process.exitCode = await run(argv.slice(2), {
    env,
    write: (text) => stdout.write(text),
  });
};

// 例外処理
main().catch((e) => {
  console.error(e);
  process.exit(1);
});
