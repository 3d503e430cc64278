// Script that generates puzzles and prints them in the puzzles.json format, ready to be piped into TestPuzzles.ts
import * as process from 'process';
import { parseArgs } from 'node:util';
import { generatePuzzle, parseDifficulty } from '../src/index';
import { Symmetry } from '../src/solver/Generator';

const symmetries: readonly Symmetry[] = ['none', 'central', 'diagonal'];

function main(): number {
    const args = parseArgs({
        options: {
            difficulty: { type: 'string', short: 'd', default: 'medium' },
            count: { type: 'string', short: 'n', default: '1' },
            seed: { type: 'string', short: 's' },
            symmetry: { type: 'string', default: 'none' },
            help: { type: 'boolean', short: 'h' },
        },
    });

    if (args.values.help) {
        console.log('Example usage:');
        console.log('    npx tsx tests/GeneratePuzzles.ts --difficulty hard --count 5 --seed 1');
        console.log();
        console.log('Flags:');
        console.log();
        console.log('    --difficulty, -d <level>  easy, medium, hard or expert (default: medium).');
        console.log('    --count, -n <n>           Number of puzzles to generate (default: 1).');
        console.log('    --seed, -s <seed>         Seed of the first puzzle; each further puzzle uses the next seed.');
        console.log('    --symmetry <symmetry>     none, central or diagonal (default: none).');
        console.log('    --help                    Print help message.');
        return 0;
    }

    const difficulty = parseDifficulty(args.values.difficulty ?? 'medium');
    if (difficulty === null) {
        console.log(`Unknown difficulty: ${args.values.difficulty}`);
        return 1;
    }
    const symmetry = symmetries.find(value => value === args.values.symmetry);
    if (symmetry === undefined) {
        console.log(`Unknown symmetry: ${args.values.symmetry}`);
        return 1;
    }
    const count = parseInt(args.values.count ?? '1', 10);
    const firstSeed = args.values.seed !== undefined ? parseInt(args.values.seed, 10) : undefined;

    const out: object[] = [];
    for (let i = 0; i < count; i++) {
        const seed = firstSeed !== undefined ? firstSeed + i : undefined;
        const result = generatePuzzle(difficulty, { seed, symmetry });
        if (result.result !== 'puzzle') {
            return 1;
        }

        const { rating } = result;
        out.push({
            title: `Generated ${result.difficulty} #${i + 1}`,
            author: 'generator',
            license: 'CC0',
            puzzle: result.clues.flat().join(''),
            solution: result.solution.flat().join(''),
            comments: `seed ${result.seed}, ${result.clueCount} clues, rated ${rating.bucket} (score ${rating.score})`,
        });
        console.error(`Generated ${i + 1}/${count}: ${result.clueCount} clues, score ${rating.score}`);
    }
    out.push({});

    console.log(JSON.stringify(out, undefined, 4));
    return 0;
}

process.exit(main());
