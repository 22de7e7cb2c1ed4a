import { InvalidArgumentError } from 'commander';

/** Commander argument parser for counts such as `--limit 0`. */
export function parseNonNegativeInt(value: string): number {
    if (!/^\d+$/.test(value.trim())) {
        throw new InvalidArgumentError('Expected a non-negative integer.');
    }
    return Number.parseInt(value, 10);
}
