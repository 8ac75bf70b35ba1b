// src/random.ts

const INITIAL_SEED = 327680;

/**
 * RND 用の24bit線形合同法乱数。
 * 同じシードからは常に同じ列を返します。
 */
export class Rnd {
    private seed: number = INITIAL_SEED;

    reseed(seed: number): void {
        this.seed = seed & 0xffffff;
    }

    /**
     * 0 以上 limit 未満の整数を返します。limit <= 0 のときは 0 です。
     */
    next(limit: number): number {
        this.seed = (this.seed * 16598013 + 12820163) & 0xffffff;
        if (limit <= 0) {
            return 0;
        }
        return Math.floor((this.seed / 0x1000000) * limit);
    }
}

/**
 * RANDOMIZE に 0 以外の引数を与えたときのシード。
 * プロセスID・ユーザーID・現在時刻（秒）を組み合わせます。
 */
export function entropySeed(): number {
    const uid = process.getuid ? process.getuid() : 0;
    return process.pid ^ uid ^ Math.floor(Date.now() / 1000);
}
