// src/cliOptions.ts - コマンドライン引数の解析

import type { CLIRunnerConfig } from './cliRunner.js';

// サブコマンドの型定義
export type Subcommand = 'run' | 'debug' | 'bench';

interface SubcommandConfig {
    name: Subcommand;
    description: string;
    defaults: Partial<CLIOptions>;
}

export interface CLIOptions {
    debug: boolean;
    verbose: boolean;
    output?: string;
    help: boolean;
    maxSteps?: number;
    unlimitedSteps: boolean;
    quiet: boolean;
}

// サブコマンドのプリセット定義
export const SUBCOMMANDS: Record<Subcommand, SubcommandConfig> = {
    run: {
        name: 'run',
        description: '通常実行（デフォルト）',
        defaults: {}
    },
    debug: {
        name: 'debug',
        description: 'デバッグ実行',
        defaults: {
            debug: true,
            verbose: true,
            maxSteps: 10000
        }
    },
    bench: {
        name: 'bench',
        description: 'ベンチマーク実行',
        defaults: {
            unlimitedSteps: true,
            verbose: true
        }
    }
};

function isSubcommand(value: string): value is Subcommand {
    return Object.prototype.hasOwnProperty.call(SUBCOMMANDS, value);
}

/**
 * コマンドライン引数からサブコマンドをパースする
 * @returns サブコマンドと残りの引数
 */
export function parseSubcommand(args: string[]): {
    subcommand: Subcommand;
    remainingArgs: string[];
} {
    const firstArg = args[0];

    // 第1引数がなければ、またはオプションかファイル名ならデフォルトの 'run'
    if (firstArg === undefined || firstArg.startsWith('-') || !isSubcommand(firstArg)) {
        return {
            subcommand: 'run',
            remainingArgs: args
        };
    }

    return {
        subcommand: firstArg,
        remainingArgs: args.slice(1)
    };
}

/**
 * サブコマンドのデフォルト値とコマンドラインオプションをマージする
 * コマンドラインオプションが優先される
 */
export function mergeOptions(
    subcommandDefaults: Partial<CLIOptions>,
    parsedOptions: CLIOptions
): CLIOptions {
    return {
        ...parsedOptions,
        debug: parsedOptions.debug || subcommandDefaults.debug === true,
        verbose: parsedOptions.verbose || subcommandDefaults.verbose === true,
        unlimitedSteps: parsedOptions.unlimitedSteps || subcommandDefaults.unlimitedSteps === true,
        quiet: parsedOptions.quiet || subcommandDefaults.quiet === true,
        ...(parsedOptions.maxSteps === undefined && subcommandDefaults.maxSteps !== undefined
            && { maxSteps: subcommandDefaults.maxSteps })
    };
}

function parseBooleanOption(arg: string, options: CLIOptions): boolean {
    switch (arg) {
        case '--debug':
        case '-d':
            options.debug = true;
            return true;
        case '--verbose':
        case '-v':
            options.verbose = true;
            return true;
        case '--help':
        case '-h':
            options.help = true;
            return true;
        case '--unlimited':
        case '-u':
            options.unlimitedSteps = true;
            return true;
        case '--quiet':
        case '-q':
            options.quiet = true;
            return true;
        default:
            return false;
    }
}

/**
 * 値を取るオプションを処理する
 * @returns 消費した追加引数の数（該当しなければ -1）
 */
function parseValueOption(arg: string, nextArg: string | undefined, options: CLIOptions): number {
    switch (arg) {
        case '--output':
        case '-o':
            if (nextArg) {
                options.output = nextArg;
                return 1;
            }
            return 0;
        case '--max-steps':
        case '-m':
            if (nextArg) {
                const steps = parseInt(nextArg, 10);
                if (!isNaN(steps) && steps > 0) {
                    options.maxSteps = steps;
                    return 1;
                }
            }
            return 0;
        default:
            return -1;
    }
}

export function parseArgs(args: string[]): { options: CLIOptions; scriptFile: string | undefined } {
    const options: CLIOptions = {
        debug: false,
        verbose: false,
        help: false,
        unlimitedSteps: false,
        quiet: false
    };

    let scriptFile: string | undefined;

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === undefined) continue;

        if (parseBooleanOption(arg, options)) {
            continue;
        }
        const consumed = parseValueOption(arg, args[i + 1], options);
        if (consumed >= 0) {
            i += consumed;
        } else if (!arg.startsWith('-') && !scriptFile) {
            scriptFile = arg;
        }
    }

    return { options, scriptFile };
}

export function buildCLIRunnerConfig(options: CLIOptions): CLIRunnerConfig {
    return {
        debug: options.debug,
        verbose: options.verbose,
        quiet: options.quiet,
        unlimitedSteps: options.unlimitedSteps,
        ...(options.maxSteps && { maxSteps: options.maxSteps }),
        ...(options.output && { outputFile: options.output })
    };
}
