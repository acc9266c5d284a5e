import { main } from './cli';
import { createPromptCredentialProvider } from './prompt';

process.exitCode = await main(process.argv.slice(2), {
  env: process.env,
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
  prompt: createPromptCredentialProvider(),
});
