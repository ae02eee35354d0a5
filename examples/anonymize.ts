/**
 * Example: Anonymize a record file.
 *
 * Usage:
 *   npx tsx examples/anonymize.ts -i game.aoe2record
 *
 *   Or with an explicit output path:
 *      npx tsx examples/anonymize.ts -i game.aoe2record -o anonymous.aoe2record
 *
 *   Keeping some of the chat (names are still replaced):
 *      npx tsx examples/anonymize.ts -i game.aoe2record --keep-system-chat
 *      npx tsx examples/anonymize.ts -i game.aoe2record --keep-player-chat
 *      npx tsx examples/anonymize.ts -i game.aoe2record --keep-chat
 */

import * as fs from 'fs';
import { ReplayAnonymizer, type AnonymizerEvent } from '../src/index.js';

interface Options {
  input: string | null;
  output: string;
  keepSystemChat: boolean;
  keepPlayerChat: boolean;
  verbose: boolean;
}

function parseArgs(): Options {
  const args = process.argv.slice(2);
  const options: Options = {
    input: null,
    output: 'out.aoe2record',
    keepSystemChat: false,
    keepPlayerChat: false,
    verbose: false,
  };

  for (let i = 0; i < args.length; i++) {
    if ((args[i] === '-i' || args[i] === '--input') && args[i + 1]) {
      options.input = args[++i];
    } else if ((args[i] === '-o' || args[i] === '--output') && args[i + 1]) {
      options.output = args[++i];
    } else if (args[i] === '--keep-system-chat') {
      options.keepSystemChat = true;
    } else if (args[i] === '--keep-player-chat') {
      options.keepPlayerChat = true;
    } else if (args[i] === '--keep-chat') {
      options.keepSystemChat = true;
      options.keepPlayerChat = true;
    } else if (args[i] === '--verbose') {
      options.verbose = true;
    } else if (!args[i].startsWith('-') && options.input === null) {
      options.input = args[i];
    }
  }

  return options;
}

function printEvent(event: AnonymizerEvent, verbose: boolean): void {
  if (event.level === 'warning') {
    console.warn(`⚠️  ${event.message}`);
  } else if (verbose) {
    console.log(`  ${event.message}`);
  }
}

function main() {
  const options = parseArgs();

  if (options.input === null) {
    console.error('❌ No input file given');
    console.log('\nUsage: npx tsx examples/anonymize.ts -i <file> [-o <file>]');
    process.exit(1);
  }

  const data = new Uint8Array(fs.readFileSync(options.input));
  console.log(`📂 Read ${options.input} (${data.length} bytes)`);

  const anonymizer = new ReplayAnonymizer({
    keepSystemChat: options.keepSystemChat,
    keepPlayerChat: options.keepPlayerChat,
    onEvent: (event) => printEvent(event, options.verbose),
  });

  const start = Date.now();
  const result = anonymizer.anonymize(data);
  const elapsed = Date.now() - start;

  fs.writeFileSync(options.output, result.data);

  console.log();
  console.log('📊 Anonymization results:');
  console.log(`  Players:         ${result.playerCount}`);
  for (const player of result.players) {
    const attributes = player.attributesReplaced ? '' : ' (attributes name not found)';
    console.log(`    ${player.replacementName}${attributes}`);
  }
  console.log(`  Chat removed:    ${result.chat.dropped}`);
  console.log(`  Chat rewritten:  ${result.chat.rewritten}`);
  console.log(`  Ratings patched: ${result.ratingsPatched}`);
  if (result.failures.length > 0) {
    console.log(`  Undecodable chat: ${result.failures.length}`);
  }
  console.log(`  Time: ${elapsed}ms`);
  console.log();
  console.log(`✅ Wrote ${options.output} (${result.data.length} bytes)`);
}

try {
  main();
} catch (err) {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}
