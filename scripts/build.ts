/*
 * Script to bundle the library (ESM, CJS and browser IIFE).
 *
 * `npm run build` compiles the sources with tsc; this script produces single
 * file bundles on top of that.
 *
 * Hint: Don't use top level await here since this will cause the debugger to
 * hang on exit.
 */

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { execSync } from 'node:child_process';
import { build, BuildOptions } from 'esbuild';

import pkg from '../package.json' with { type: 'json' };

/**
 * Defines if the the build should be a production build.
 */
const prod = process.env.NODE_ENV === 'production';

/**
 * Base dir of the project.
 */
const baseDir = path.join(path.dirname(fileURLToPath(import.meta.url)), '..');

/**
 * Output dir of the bundles.
 */
const outDir = path.join(baseDir, 'dist', 'bundle');

/*
 * create version information
 */
const commitId = execSync('git log --format="%H" -n1 2>/dev/null || echo dev').toString().trim();
const version = execSync('git describe 2>/dev/null || true').toString().trim().replace(/^v/, '') || `${pkg.version}-${commitId}`;
console.log(`
Version: ${version}
Commit-ID: ${commitId}
`);

let building = false;
let buildCounter = 0;

/**
 * Common build options.
 */
const buildOptions: BuildOptions & { metafile: true } = {
  absWorkingDir: baseDir,
  entryPoints: [
    './src/index.ts',
  ],
  bundle: true,
  sourcemap: !prod,
  target: 'node20',
  treeShaking: true,
  metafile: true,
  banner: {
    js: `/*! ${pkg.name} v${version} */`,
  },
};

/**
 * Do the build.
 */
async function doBuild (): Promise<boolean> {
  building = true;

  process.stdout.write(`Doing ${prod ? 'production' : 'development'} build #${++buildCounter} ... `);
  const startTime = Date.now();

  /** return success state */
  let success = true;

  try {
    const [ esmResult, cjsResult, browserResult, browserMinResult ] = await Promise.all([
      // ESM bundle
      build({
        ...buildOptions,
        outfile: path.join(outDir, 'safemark.mjs'),
        format: 'esm',
        platform: 'neutral',
      }),

      // CJS bundle
      build({
        ...buildOptions,
        outfile: path.join(outDir, 'safemark.cjs'),
        format: 'cjs',
        platform: 'node',
      }),

      // Browser bundle
      build({
        ...buildOptions,
        outfile: path.join(outDir, 'safemark.js'),
        format: 'iife',
        platform: 'browser',
        globalName: 'safemark',
        sourcemap: false,
      }),

      // Browser bundle (minified)
      build({
        ...buildOptions,
        outfile: path.join(outDir, 'safemark.min.js'),
        minify: true,
        format: 'iife',
        platform: 'browser',
        globalName: 'safemark',
        sourcemap: false,
      }),
    ]);

    // write results metafiles
    await Promise.all([
      fs.promises.writeFile(path.join(outDir, 'metaEsm.json'), JSON.stringify(esmResult.metafile, undefined, 2)),
      fs.promises.writeFile(path.join(outDir, 'metaCjs.json'), JSON.stringify(cjsResult.metafile, undefined, 2)),
      fs.promises.writeFile(path.join(outDir, 'metaBrowser.json'), JSON.stringify(browserResult.metafile, undefined, 2)),
      fs.promises.writeFile(path.join(outDir, 'metaBrowserMin.json'), JSON.stringify(browserMinResult.metafile, undefined, 2)),
    ]);

    const inputs = Object.keys(esmResult.metafile.inputs).length;
    process.stdout.write(`(${inputs} source files bundled) `);
  } catch (err) {
    success = false;
    console.error(err);
  }

  const duration = Date.now() - startTime;
  process.stdout.write(`Build done in ${(duration / 1000).toFixed(2)}s\n`);

  building = false;

  return success;
}

/**
 * Main function to init the process
 */
async function main (): Promise<void> {

  // run a normal build
  let success = await doBuild();

  // Watch for changes?
  if (process.argv.includes('--watch')) {
    let debounce: NodeJS.Timeout | null = null;

    console.log('Watching for src changes ...');

    const watcher = fs.watch(path.join(baseDir, 'src'), { recursive: true }, (_event, _filename) => {
      if (debounce) {
        clearTimeout(debounce);
      }

      // run build debounced
      debounce = setTimeout(() => {
        debounce = null;

        // do nothing if already building
        if (building) return;

        doBuild()
          .then((res) => {
            success = res;
          })
          .catch((err: unknown) => {
            console.error(err);
          });
      }, 2000);
    });

    process.on('SIGINT', () => {
      console.log('Stop watching for changes');
      watcher.close();
      process.exit(success ? 0 : 1);
    });

    return;
  }

  // exit with proper code
  process.exit(success ? 0 : 1);
}

void main();
