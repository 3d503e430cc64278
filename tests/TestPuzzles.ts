// Script that loads puzzles from stdin, solves them, and prints out whether they passed, as well as their timings
import * as fs from 'fs';
import * as process from 'process';
import { parseArgs } from 'node:util';
import { parsePuzzlesJson } from './ParsePuzzles';
import { solvePuzzleForStats } from './RunSolver';
import { runChecksOnPuzzles, serializeCheckFailure, solveChecks } from './SolveChecks';

function main(): number {
    const args = parseArgs({
        options: {
            printFailed: { type: 'boolean' },
            printAll: { type: 'boolean' },
            stats: { type: 'boolean' },
            verbose: { type: 'boolean', short: 'v' },
            help: { type: 'boolean', short: 'h' },
        },
        allowPositionals: true,
    });

    if (args.values.help) {
        console.log('Example usage:');
        console.log('    npx tsx tests/TestPuzzles.ts < puzzles/puzzles.json');
        console.log();
        console.log('Flags:');
        console.log();
        console.log('    --printFailed      Print JSON for failed puzzles, including their failure reason.');
        console.log('                       --verbose can be passed to include solve output.');
        console.log('    --printAll         Print JSON for all puzzles, do not run any checks.');
        console.log('    --stats            Print search statistics and timings for each puzzle.');
        console.log('    --verbose, -v      Print solve output in addition to any failed puzzles.');
        console.log('    --help             Print help message.');
        console.log();
        console.log('Positional arguments can be used to filter puzzles by which check they failed.');
        console.log();
        console.log('More examples:');
        console.log();
        console.log('- Get puzzles that failed and store them in `failures.json`:');
        console.log('    npx tsx tests/TestPuzzles.ts --printFailed < puzzles/puzzles.json > failures.json');
        console.log();
        console.log('- Get all puzzles whose provided solution did not match the solver:');
        console.log('    npx tsx tests/TestPuzzles.ts --printFailed ProvidedSolutionCheck < puzzles/puzzles.json');
        console.log();
        console.log('- Check a batch of generated puzzles:');
        console.log('    npx tsx tests/GeneratePuzzles.ts --count 20 --difficulty expert | npx tsx tests/TestPuzzles.ts');
        return 0;
    }

    const verbose = args.values.verbose ?? false;
    const printFailed = args.values.printFailed;
    const printChecks = args.positionals;
    const printAll = args.values.printAll;

    // Validate args
    if (printFailed && printAll) {
        console.log('At most one of --printFailed and --printAll can be used');
        return 1;
    }
    for (const printCheck of printChecks) {
        if (!solveChecks.some(check => check.constructor.name === printCheck)) {
            console.log(`Unknown check name: ${printCheck}`);
            return 1;
        }
    }

    // Read puzzles from stdin
    const puzzles = parsePuzzlesJson(fs.readFileSync(0, 'utf-8'));

    // If simply printing all puzzles, skip checks
    if (printAll) {
        console.log(JSON.stringify(puzzles.map(puzzle => puzzle.serialize()).concat([{}]), undefined, 4));
        return 0;
    }

    if (args.values.stats) {
        for (const puzzle of puzzles) {
            const { solveStats, elapsedMs } = solvePuzzleForStats(puzzle);
            console.log(`${puzzle.title}: ${elapsedMs.toFixed(1)}ms`, solveStats ?? 'invalid');
        }
        console.log();
    }

    const [failures, numPuzzlesFailed] = runChecksOnPuzzles(puzzles);

    if (!printFailed) {
        // Just print a summary of how many failures there were for each check
        let numChecksFailed = 0;
        for (const check of solveChecks) {
            const checkFailures = failures.get(check.constructor.name) ?? [];
            numChecksFailed += checkFailures.length > 0 ? 1 : 0;
            console.log(`${check.constructor.name}:`, checkFailures.length, 'failed');
        }
        console.log();
        // Don't use format strings so we get coloured numbers on the console
        console.log('Checks:', numChecksFailed, 'failed', solveChecks.length - numChecksFailed, 'passed', solveChecks.length, 'total');
        console.log('Puzzles:', numPuzzlesFailed, 'failed', puzzles.length - numPuzzlesFailed, 'passed', puzzles.length, 'total');
    } else {
        const checkNames = printChecks.length > 0 ? printChecks : solveChecks.map(check => check.constructor.name);
        const collectedFailures: object[] = [];
        for (const checkName of checkNames) {
            for (const checkFailure of failures.get(checkName) ?? []) {
                collectedFailures.push(serializeCheckFailure(checkFailure, verbose));
            }
        }

        // Add an empty object so we get a trailing comma
        collectedFailures.push({});

        console.log(JSON.stringify(collectedFailures, undefined, 4));
    }

    return numPuzzlesFailed;
}

process.exit(main());
