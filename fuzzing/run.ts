/**
 * Standalone continuous fuzzer for the status list codec.
 *
 * Cycles through the packer, builder, decoder, JSON and CBOR targets,
 * reporting any input that escapes with something other than a
 * StatusListError or breaks a round-trip invariant.
 *
 * Usage:
 *   npx tsx fuzzing/run.ts [--iterations N] [--target packer|builder|decoder|json|cbor]
 */

import { FUZZ_TARGETS, FuzzFailure, FuzzTargetName } from './targets';

interface TargetStats {
  ok: number;
  rejected: number;
}

function isTargetName(value: string): value is FuzzTargetName {
  return value in FUZZ_TARGETS;
}

function main(): void {
  const args = process.argv.slice(2);
  let maxIterations = Infinity;
  let targets: FuzzTargetName[] = ['packer', 'builder', 'decoder', 'json', 'cbor'];

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--iterations' && args[i + 1]) {
      maxIterations = parseInt(args[i + 1], 10);
      i++;
    } else if (args[i] === '--target' && args[i + 1]) {
      const name = args[i + 1];
      if (!isTargetName(name)) {
        console.error(`Unknown target: ${name}`);
        process.exitCode = 1;
        return;
      }
      targets = [name];
      i++;
    }
  }

  console.log('Status List Fuzzer');
  console.log(`Targets: ${targets.join(', ')}`);
  console.log(`Max iterations: ${maxIterations === Infinity ? 'unlimited' : maxIterations}`);
  console.log('');

  const stats = new Map<FuzzTargetName, TargetStats>(
    targets.map((t): [FuzzTargetName, TargetStats] => [t, { ok: 0, rejected: 0 }]),
  );
  const failures: FuzzFailure[] = [];
  const startTime = Date.now();
  let iteration = 0;

  while (iteration < maxIterations) {
    const target = targets[iteration % targets.length];
    const seed = iteration + 1;
    try {
      const outcome = FUZZ_TARGETS[target](seed);
      const entry = stats.get(target);
      if (entry) entry[outcome]++;
    } catch (err) {
      const failure = err instanceof FuzzFailure
        ? err
        : new FuzzFailure(target, seed, String(err), { cause: err });
      failures.push(failure);
      console.error(`\n[!] ${failure.message}`);
    }

    iteration++;

    // Progress report every 1000 iterations
    if (iteration % 1000 === 0) {
      const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
      const rate = (iteration / ((Date.now() - startTime) / 1000)).toFixed(0);
      console.log(`[${elapsed}s] iteration=${iteration} rate=${rate}/s failures=${failures.length}`);
    }
  }

  const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
  console.log('');
  console.log('=== Final Report ===');
  console.log(`Total iterations: ${iteration}`);
  console.log(`Elapsed: ${elapsed}s`);
  for (const [target, { ok, rejected }] of stats) {
    console.log(`${target}: ok=${ok} rejected=${rejected}`);
  }

  if (failures.length > 0) {
    console.log('');
    console.log(`=== ${failures.length} issue(s) found ===`);
    for (const failure of failures) {
      console.log(`  Target: ${failure.target}, Seed: ${failure.seed}`);
      console.log(`  ${failure.message}`);
    }
    process.exitCode = 1;
  } else {
    console.log('\nNo issues found.');
  }
}

main();
