import { runCli } from './cli';

const controller = new AbortController();
process.once('SIGINT', () => {
  console.warn('Stopping after the current row...');
  controller.abort();
});

runCli(process.argv.slice(2), { signal: controller.signal })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error(err);
    process.exitCode = 1;
  });
