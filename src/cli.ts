#!/usr/bin/env node

// src/cli.ts - linebasic CLI エントリーポイント

import * as fs from 'fs';
import * as path from 'path';
import { CLIRunner, DEFAULT_MAX_STEPS } from './cliRunner.js';
import { SUBCOMMANDS, buildCLIRunnerConfig, mergeOptions, parseArgs, parseSubcommand } from './cliOptions.js';
import type { CLIOptions } from './cliOptions.js';
import { isBasicError } from './errors.js';

function showHelp() {
    console.log(`
linebasic - 行番号付きBASICインタプリタ

使用方法:
  linebasic <subcommand> <program.bas> [options]
  linebasic <program.bas> [options]  # runサブコマンド省略可

サブコマンド:
  run       通常実行（デフォルト）
  debug     デバッグ実行（行ごとのトレース + 詳細ログ）
  bench     ベンチマーク実行（ステップ数無制限 + 実行時間表示）

オプション:
  -h, --help              このヘルプを表示
  -d, --debug             行ごとのトレースを表示
  -v, --verbose           詳細なログを出力
  -q, --quiet             警告や保存メッセージを表示しない
  -o, --output FILE       出力をJSONファイルに保存
  -u, --unlimited         ステップ数無制限で実行
  -m, --max-steps N       最大ステップ数を指定（デフォルト: ${DEFAULT_MAX_STEPS}）

INPUT 文は標準入力から1行ずつ読みます。

例:
  linebasic examples/hello.bas
  echo 42 | linebasic run examples/input.bas
  linebasic debug examples/gosub.bas --max-steps 100
  linebasic bench examples/primes.bas -o result.json
`);
}

async function executeScriptFile(scriptFile: string, options: CLIOptions): Promise<void> {
    if (!fs.existsSync(scriptFile)) {
        console.error(`❌ ファイルが見つかりません: ${scriptFile}`);
        process.exit(1);
    }

    const script = fs.readFileSync(scriptFile, 'latin1');
    if (options.verbose) console.log(`📄 プログラムを読み込みました: ${scriptFile}`);

    const runner = new CLIRunner(buildCLIRunnerConfig(options));
    await runner.executeScript(script, path.basename(scriptFile));
}

async function main() {
    const args = process.argv.slice(2);

    const { subcommand, remainingArgs } = parseSubcommand(args);
    const { options: parsedOptions, scriptFile } = parseArgs(remainingArgs);

    if (parsedOptions.help) {
        showHelp();
        process.exit(0);
    }

    const options = mergeOptions(SUBCOMMANDS[subcommand].defaults, parsedOptions);

    if (options.verbose) {
        console.log('🚀 linebasic starting...');
        console.log(`Subcommand: ${subcommand}`);
        if (scriptFile) console.log(`Program file: ${scriptFile}`);
    }

    if (!scriptFile) {
        console.error('❌ プログラムファイルが必要です');
        showHelp();
        process.exit(1);
    }

    try {
        await executeScriptFile(scriptFile, options);
    } catch (error) {
        // BasicError の報告は CLIRunner が表示済み
        if (!isBasicError(error)) {
            console.error('❌ 実行エラー:', error instanceof Error ? error.message : error);
        }
        process.exit(1);
    }
}

if (require.main === module) {
    main().catch((error: unknown) => {
        console.error(error);
        process.exit(1);
    });
}
