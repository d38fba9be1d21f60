#!/usr/bin/env node

import * as path from 'path';
import * as fs from 'fs';
import {
  DEFAULT_OUTPUT_FILE,
  buildRouteTree,
  generateRoutesFile,
  summarizeGeneration,
  type GenerateResult,
} from './routes-generator.js';
import { DEFAULT_OPENAPI_FILE, writeOpenApiFile, type OpenApiFormat } from './openapi.js';
import {
  generateLoader,
  generateMiddleware,
  generatePage,
  generateProxy,
  generateRoute,
  isMiddlewareTemplate,
  isProxyTemplate,
  type MiddlewareTemplate,
  type ProxyTemplate,
  type ScaffoldResult,
} from './scaffold.js';
import { resolveConflicts } from '../routing/conflicts.js';
import { scanApp, STAGING_DIR_NAME } from '../routing/scanner.js';
import { calculatePriority } from '../routing/segments.js';

const args = process.argv.slice(2);
const command = args[0];
const subcommand = args[1];
const restArgs = args.slice(2);
const WATCH_DEBOUNCE_MS = 120;

interface GenerateConfig {
  appDir: string;
  outputPath: string;
  verbose: boolean;
}

function showHelp() {
  console.log(`
kiln CLI

Usage:
  kiln routes generate [options]      Generate the route registration module from src/app
  kiln routes watch [options]         Watch src/app and regenerate on changes
  kiln routes list [options]          Print routes in match order with their middleware
  kiln routes init                    Create a starter app and generate routes
  kiln generate <kind> [path]         Scaffold a route, middleware, proxy, page or loader
  kiln openapi generate [options]     Write an OpenAPI document describing the API routes
  kiln help                           Show this help message

Options:
  --output <path>     Output file (default: ./${DEFAULT_OUTPUT_FILE})
  --verbose           Report skipped declarations and staging changes
  --json              Print a JSON report instead of status lines

Examples:
  npx kiln routes generate
  npx kiln routes generate --output src/routes.generated.ts
  npx kiln generate route users/[id] --methods GET,PUT
`);
}

function showRoutesHelp() {
  console.log(`
kiln CLI - Routes

Usage:
  kiln routes generate [options]      Generate the route registration module from src/app
  kiln routes watch [options]         Watch src/app and regenerate on changes
  kiln routes list [options]          Print routes in match order with their middleware
  kiln routes init                    Create a starter app and generate routes
  kiln routes --help                  Show this help message

Options:
  --output <path>     Output file (default: ./${DEFAULT_OUTPUT_FILE})
  --verbose           Report skipped declarations and staging changes
  --json              (generate) Print a JSON report instead of status lines

Examples:
  npx kiln routes generate
  npx kiln routes generate --json
  npx kiln routes watch --verbose
  npx kiln routes list
`);
}

function showGenerateHelp() {
  console.log(`
kiln CLI - Generate

Usage:
  kiln generate route <path> [--methods GET,POST]
  kiln generate middleware [path] [--template blank|logging|timing]
  kiln generate proxy [--template blank|maintenance]
  kiln generate page [path] [--with-layout]
  kiln generate loader [path] [--data-type Name]

Paths are relative to src/app and use the directory conventions:
  [id]  dynamic segment    [...slug]  catch-all    [[...slug]]  optional catch-all
  (group)  route group     _private   ignored folder

Existing files are never overwritten.

Examples:
  npx kiln generate route api/users/[id] --methods GET,PUT,DELETE
  npx kiln generate middleware (admin) --template logging
  npx kiln generate page blog/[slug] --with-layout
  npx kiln generate loader dashboard --data-type DashboardStats
`);
}

function showOpenApiHelp() {
  console.log(`
kiln CLI - OpenAPI

Usage:
  kiln openapi generate [options]

Options:
  --output <path>        Output file (default: ./${DEFAULT_OPENAPI_FILE})
  --format json|yaml     Output format (default: from the output extension, else json)
  --title <text>         API title (default: package.json name, else "API")
  --version <text>       API version (default: 1.0.0)
  --description <text>   API description
  --server <url>         Server URL, repeatable
  --openapi30            Emit OpenAPI 3.0.3 instead of 3.1.0
  --json                 Print a JSON report instead of status lines

Summaries and descriptions come from the JSDoc above each handler.

Examples:
  npx kiln openapi generate
  npx kiln openapi generate --output docs/api.yaml --server https://api.example.com
`);
}

function hasHelpFlag(list: string[]): boolean {
  return list.includes('--help') || list.includes('-h') || list.includes('help');
}

function flagValue(list: string[], flag: string): string | undefined {
  const index = list.indexOf(flag);
  if (index === -1) return undefined;

  const value = list[index + 1];
  if (!value || value.startsWith('--')) {
    console.error(`❌ Missing value for ${flag}`);
    process.exit(1);
  }
  return value;
}

function positionals(list: string[], valueFlags: string[]): string[] {
  const result: string[] = [];
  for (let i = 0; i < list.length; i++) {
    const arg = list[i];
    if (valueFlags.includes(arg)) {
      i++;
      continue;
    }
    if (!arg.startsWith('--')) result.push(arg);
  }
  return result;
}

function flagValues(list: string[], flag: string): string[] {
  const values: string[] = [];
  for (let i = 0; i < list.length; i++) {
    if (list[i] !== flag) continue;
    const value = list[i + 1];
    if (!value || value.startsWith('--')) {
      console.error(`❌ Missing value for ${flag}`);
      process.exit(1);
    }
    values.push(value);
  }
  return values;
}

function findProjectRoot(startDir: string): string | null {
  let current = path.resolve(startDir);

  while (true) {
    if (fs.existsSync(path.join(current, 'package.json'))) {
      return current;
    }

    const parent = path.dirname(current);
    if (parent === current) {
      return null;
    }
    current = parent;
  }
}

function resolveAppDir(cwd: string): string {
  const projectRoot = findProjectRoot(cwd) ?? path.resolve(cwd);
  return path.join(projectRoot, 'src', 'app');
}

function resolveGenerateConfig(cliArgs: string[], cwd = process.cwd()): GenerateConfig {
  const output = flagValue(cliArgs, '--output');
  const appDir = resolveAppDir(cwd);
  const projectRoot = path.dirname(path.dirname(appDir));

  return {
    appDir,
    outputPath: output ? path.resolve(cwd, output) : path.join(projectRoot, DEFAULT_OUTPUT_FILE),
    verbose: cliArgs.includes('--verbose'),
  };
}

function label(file: string): string {
  return (path.relative(process.cwd(), file) || file).split(path.sep).join('/');
}

function reportGeneration(result: GenerateResult) {
  const { scan, routes } = result;
  const counts = [
    `${routes.length} route${routes.length === 1 ? '' : 's'}`,
    `${scan.pages.length} page${scan.pages.length === 1 ? '' : 's'}`,
    `${scan.middleware.length} middleware`,
    scan.proxy && scan.proxy.hasValidSignature ? 'proxy' : 'no proxy',
  ];

  if (result.conflicts.length > 0 || result.warnings.length > 0) {
    console.log(`⚠️  ${result.conflicts.length} conflict(s), ${result.warnings.length} warning(s)`);
  }
  if (scan.skipped.length > 0) {
    console.log(`⚠️  ${scan.skipped.length} declaration(s) skipped (run with --verbose for details)`);
  }

  const state = result.written ? 'Generated' : 'Up to date';
  console.log(`✅ ${state}: ${label(result.outputPath)} (${counts.join(', ')})`);
}

async function generateRoutes(cliArgs: string[]) {
  const { appDir, outputPath, verbose } = resolveGenerateConfig(cliArgs);

  if (cliArgs.includes('--json')) {
    try {
      const result = await generateRoutesFile(appDir, outputPath, { verbose });
      console.log(JSON.stringify(summarizeGeneration(result), null, 2));
    } catch (error) {
      console.log(JSON.stringify({
        error: 'generation failed',
        details: error instanceof Error ? error.message : String(error),
      }, null, 2));
      process.exit(1);
    }
    return;
  }

  console.log('');
  console.log('🚀 kiln Routes Generator');
  console.log('');

  try {
    reportGeneration(await generateRoutesFile(appDir, outputPath, { verbose }));
  } catch (error) {
    console.error('❌ Error generating routes:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

function readPackageName(projectRoot: string): string | undefined {
  const pkgPath = path.join(projectRoot, 'package.json');
  if (!fs.existsSync(pkgPath)) return undefined;

  let pkg: unknown;
  try {
    pkg = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
  } catch (error) {
    if (error instanceof SyntaxError) return undefined;
    throw error;
  }
  return pkg && typeof pkg === 'object' && 'name' in pkg && typeof pkg.name === 'string' && pkg.name ? pkg.name : undefined;
}

async function generateOpenApi(cliArgs: string[]) {
  const cwd = process.cwd();
  const appDir = resolveAppDir(cwd);
  const projectRoot = path.dirname(path.dirname(appDir));
  const output = flagValue(cliArgs, '--output');
  const outputPath = output ? path.resolve(cwd, output) : path.join(projectRoot, DEFAULT_OPENAPI_FILE);
  const formatFlag = flagValue(cliArgs, '--format');
  const json = cliArgs.includes('--json');

  let format: OpenApiFormat | undefined;
  if (formatFlag !== undefined) {
    if (formatFlag !== 'json' && formatFlag !== 'yaml') {
      console.error(`❌ Unknown format: ${formatFlag} (expected json or yaml)`);
      process.exit(1);
    }
    format = formatFlag;
  }

  try {
    const result = await writeOpenApiFile(appDir, outputPath, {
      format,
      title: flagValue(cliArgs, '--title') ?? readPackageName(projectRoot),
      version: flagValue(cliArgs, '--version'),
      description: flagValue(cliArgs, '--description'),
      servers: flagValues(cliArgs, '--server'),
      openapiVersion: cliArgs.includes('--openapi30') ? '3.0.3' : '3.1.0',
      verbose: cliArgs.includes('--verbose'),
    });

    if (json) {
      console.log(JSON.stringify({
        file: result.outputPath,
        format: result.format,
        version: result.version,
        routes: result.routes,
        size: result.size,
      }, null, 2));
      return;
    }

    const state = result.written ? 'Generated' : 'Up to date';
    console.log(`✅ ${state}: ${label(result.outputPath)} (OpenAPI ${result.version}, ${result.routes} route(s), ${result.size} bytes)`);
  } catch (error) {
    if (json) {
      console.log(JSON.stringify({
        error: 'generation failed',
        details: error instanceof Error ? error.message : String(error),
      }, null, 2));
    } else {
      console.error('❌ Error generating OpenAPI document:', error instanceof Error ? error.message : error);
    }
    process.exit(1);
  }
}

function listRoutes(cliArgs: string[]) {
  const { appDir, verbose } = resolveGenerateConfig(cliArgs);

  try {
    const scan = scanApp(appDir, { verbose });
    const { routes } = resolveConflicts(scan);
    const tree = buildRouteTree(routes, scan.middleware, scan.proxy);

    const entries = [
      ...tree.routes().map(entry => ({
        method: entry.method,
        pattern: entry.pattern,
        priority: entry.priority,
        scope: entry.scope,
        file: entry.handler.sourceFile,
      })),
      ...scan.pages.map(page => ({
        method: 'PAGE',
        pattern: page.pattern,
        priority: calculatePriority(page.pattern),
        scope: page.scope,
        file: page.sourceFile,
      })),
    ].sort((a, b) => b.priority - a.priority);

    if (entries.length === 0) {
      console.log('No routes found in', label(appDir));
      return;
    }

    const proxy = tree.proxy();
    if (proxy) {
      const patterns = proxy.matcher.patterns.length > 0 ? proxy.matcher.patterns.join(', ') : 'all paths';
      console.log(`proxy    ${label(proxy.handler.sourceFile)} (${patterns})`);
      console.log('');
    }

    const methodWidth = Math.max(...entries.map(e => e.method.length));
    const patternWidth = Math.max(...entries.map(e => e.pattern.length));
    for (const entry of entries) {
      const chain = tree.middlewareChain(entry.scope).map(mw => label(mw.middleware.sourceFile));
      console.log(
        `${entry.method.padEnd(methodWidth)}  ${entry.pattern.padEnd(patternWidth)}  ${String(entry.priority).padStart(3)}  ${label(entry.file)}`
      );
      if (chain.length > 0) console.log(`${' '.repeat(methodWidth + 2)}└ ${chain.join(' → ')}`);
    }
  } catch (error) {
    console.error('❌ Error listing routes:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

async function initRoutes() {
  const appDir = resolveAppDir(process.cwd());

  if (fs.existsSync(appDir)) {
    console.log('⚠️  App directory already exists');
    return;
  }

  console.log('📁 Creating app directory...');
  let created: string[];
  try {
    created = [
      ...generatePage({ appDir, withLayout: true }).files,
      ...generateRoute({ appDir, path: 'api/health' }).files,
    ];
  } catch (error) {
    console.error('❌ Error creating starter files:', error instanceof Error ? error.message : error);
    process.exit(1);
  }

  console.log(`✅ Created app directory with starter files (${label(appDir)}):`);
  for (const file of created) {
    console.log(`   ${label(file)}`);
  }

  const { outputPath } = resolveGenerateConfig([]);
  console.log('🧩 Generating routes...');

  try {
    reportGeneration(await generateRoutesFile(appDir, outputPath));
  } catch (error) {
    console.error('❌ Error generating routes:', error instanceof Error ? error.message : error);
    process.exit(1);
  }

  const appDirPosix = label(appDir);
  console.log('');
  console.log('Next steps:');
  console.log(`  1. Add pages with page.ts (e.g. ${appDirPosix}/about/page.ts)`);
  console.log(`  2. Add dynamic segments with folders like ${appDirPosix}/blog/[slug]/`);
  console.log('  3. Add route.ts for API handlers and middleware.ts for guards');
  console.log('  4. Call registerRoutes(app) from your server entry');
  console.log('  5. Run: kiln routes generate (after changing app files)');
  console.log('');
}

function collectRouteDirs(rootDir: string): string[] {
  const dirs: string[] = [];

  function visit(dir: string) {
    dirs.push(dir);
    const entries = fs.readdirSync(dir, { withFileTypes: true });
    for (const entry of entries) {
      if (!entry.isDirectory()) continue;
      if (entry.name.startsWith('.') || entry.name === 'node_modules' || entry.name === STAGING_DIR_NAME) continue;
      visit(path.join(dir, entry.name));
    }
  }

  visit(rootDir);
  return dirs;
}

function watchRoutes(cliArgs: string[]) {
  const { appDir, outputPath, verbose } = resolveGenerateConfig(cliArgs);
  const watchedDirs = new Map<string, fs.FSWatcher>();
  const outputAbsPath = path.resolve(outputPath);
  let regenerateTimer: NodeJS.Timeout | null = null;

  if (!fs.existsSync(appDir)) {
    console.error('❌ App directory not found:', appDir);
    process.exit(1);
  }

  console.log('');
  console.log('👀 kiln Routes Watch');
  console.log(`   app: ${appDir}`);
  console.log(`   output: ${outputPath}`);
  console.log('');

  const runGenerate = async () => {
    try {
      reportGeneration(await generateRoutesFile(appDir, outputPath, { verbose }));
    } catch (error) {
      console.error('❌ Error generating routes:', error instanceof Error ? error.message : error);
    }
  };

  const refreshWatchers = () => {
    const nextDirs = new Set(collectRouteDirs(appDir).map(d => path.resolve(d)));

    for (const [dir, watcher] of watchedDirs.entries()) {
      if (!nextDirs.has(dir)) {
        watcher.close();
        watchedDirs.delete(dir);
      }
    }

    for (const dir of nextDirs) {
      if (watchedDirs.has(dir)) continue;

      try {
        const watcher = fs.watch(dir, (_eventType, filename) => {
          if (filename && path.resolve(dir, filename.toString()) === outputAbsPath) {
            return;
          }

          if (regenerateTimer) clearTimeout(regenerateTimer);
          regenerateTimer = setTimeout(() => {
            refreshWatchers();
            console.log('♻️  Route change detected, regenerating...');
            void runGenerate();
          }, WATCH_DEBOUNCE_MS);
        });

        watcher.on('error', err => {
          console.error(`❌ Watch error in ${dir}:`, err);
        });

        watchedDirs.set(dir, watcher);
      } catch (error) {
        console.error(`❌ Failed to watch directory ${dir}:`, error);
      }
    }
  };

  const stop = () => {
    if (regenerateTimer) clearTimeout(regenerateTimer);
    for (const watcher of watchedDirs.values()) {
      watcher.close();
    }
    watchedDirs.clear();
    console.log('\n🛑 Stopped routes watch');
  };

  void runGenerate();
  refreshWatchers();

  process.on('SIGINT', () => {
    stop();
    process.exit(0);
  });

  process.on('SIGTERM', () => {
    stop();
    process.exit(0);
  });
}

function runScaffold(kind: string | undefined, cliArgs: string[]) {
  const appDir = resolveAppDir(process.cwd());
  const [target] = positionals(cliArgs, ['--methods', '--template', '--data-type']);
  const template = flagValue(cliArgs, '--template');
  let result: ScaffoldResult;

  try {
    switch (kind) {
      case 'route': {
        if (!target) {
          console.error('❌ Missing route path (e.g. kiln generate route api/users)');
          process.exit(1);
        }
        const methods = flagValue(cliArgs, '--methods')?.split(',');
        result = generateRoute({ appDir, path: target, methods });
        break;
      }
      case 'middleware': {
        let middlewareTemplate: MiddlewareTemplate | undefined;
        if (template !== undefined) {
          if (!isMiddlewareTemplate(template)) {
            console.error(`❌ Unknown middleware template: ${template}`);
            process.exit(1);
          }
          middlewareTemplate = template;
        }
        result = generateMiddleware({ appDir, path: target, template: middlewareTemplate });
        break;
      }
      case 'proxy': {
        let proxyTemplate: ProxyTemplate | undefined;
        if (template !== undefined) {
          if (!isProxyTemplate(template)) {
            console.error(`❌ Unknown proxy template: ${template}`);
            process.exit(1);
          }
          proxyTemplate = template;
        }
        result = generateProxy({ appDir, template: proxyTemplate });
        break;
      }
      case 'page':
        result = generatePage({ appDir, path: target, withLayout: cliArgs.includes('--with-layout') });
        break;
      case 'loader':
        result = generateLoader({ appDir, path: target, dataType: flagValue(cliArgs, '--data-type') });
        break;
      default:
        console.error('Unknown generator:', kind);
        showGenerateHelp();
        process.exit(1);
    }
  } catch (error) {
    console.error('❌', error instanceof Error ? error.message : error);
    process.exit(1);
  }

  for (const file of result.files) {
    console.log(`✅ Created ${label(file)}`);
  }
  if (result.pattern) {
    console.log(`   serves ${result.pattern}`);
  }
  console.log('   Run: kiln routes generate');
}

// Main
async function main() {
  if (command === 'help' || !command || command === '--help' || command === '-h') {
    showHelp();
  } else if (command === 'routes') {
    if (!subcommand || subcommand === 'help' || subcommand === '--help' || subcommand === '-h' || hasHelpFlag(restArgs)) {
      showRoutesHelp();
    } else if (subcommand === 'generate') {
      await generateRoutes(restArgs);
    } else if (subcommand === 'watch') {
      watchRoutes(restArgs);
    } else if (subcommand === 'list') {
      listRoutes(restArgs);
    } else if (subcommand === 'init') {
      await initRoutes();
    } else {
      console.error('Unknown subcommand:', subcommand);
      showRoutesHelp();
      process.exit(1);
    }
  } else if (command === 'openapi') {
    if (!subcommand || hasHelpFlag(args.slice(1))) {
      showOpenApiHelp();
    } else if (subcommand === 'generate') {
      await generateOpenApi(restArgs);
    } else {
      console.error('Unknown subcommand:', subcommand);
      showOpenApiHelp();
      process.exit(1);
    }
  } else if (command === 'generate') {
    if (!subcommand || hasHelpFlag(args.slice(1))) {
      showGenerateHelp();
    } else {
      runScaffold(subcommand, restArgs);
    }
  } else {
    console.error('Unknown command:', command);
    showHelp();
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('❌ Unexpected error:', error);
  process.exit(1);
});
