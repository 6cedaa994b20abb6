/**
 * @fileoverview kawaii-olog CLI command definitions
 *
 * Commands for generating designs, inspecting archetypes and the taxonomy,
 * and serving the HTTP API.
 *
 * @module cli
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_PORT } from './config/defaults.js';
import { DesignService } from './design-service.js';
import { getRepository, type SpecificationRepository } from './spec-repository.js';
import { getErrorMessage, type DesignIntent, type DesignSpecification } from './types.js';

const program = new Command();

program
  .name('kawaii-olog')
  .description('Resolve creative prompts into reproducible character design specifications')
  .version('1.0.0')
  .option('--olog-dir <path>', 'Directory containing the olog documents');

/**
 * Load the repository or exit. A broken olog is fatal.
 */
function loadRepository(): SpecificationRepository {
  const { ologDir } = program.opts<{ ologDir?: string }>();
  try {
    return getRepository(ologDir);
  } catch (err) {
    console.error(chalk.red(`✗ Failed to load ologs: ${getErrorMessage(err)}`));
    process.exit(1);
  }
}

function printDesign(design: DesignSpecification): void {
  console.log(chalk.bold(`\n${design.characterName}`) + chalk.gray(`  (seed ${design.designSeed})`));
  console.log(`  Archetype:  ${chalk.cyan(design.archetype)}`);
  for (const [dimension, instance] of Object.entries(design.choices)) {
    console.log(`  ${dimension.padEnd(15)} ${instance}`);
  }
  console.log(chalk.bold('\nRationale:'));
  console.log(`  ${design.designRationale}`);
  console.log(chalk.bold('\nGuidelines:'));
  const g = design.designGuidelines;
  for (const line of [g.aesthetic, g.headDescription, g.bodyDescription, g.facialDescription, g.sizeNote, g.colorNote]) {
    console.log(`  - ${line}`);
  }
  console.log('');
}

// ============ Design Commands ============

program
  .command('design <prompt...>')
  .alias('d')
  .description('Generate a character design from a prompt')
  .option('--mood <text>', 'Creative mood description')
  .option('--weight <text>', 'How heavy or light the design should feel')
  .option('--color <text>', 'Colour palette feeling')
  .option('--size <text>', 'Size implication')
  .option('--shape <text>', 'Dominant shape characteristic')
  .option('--json', 'Print the full specification as JSON')
  .action(
    (
      words: string[],
      options: { mood?: string; weight?: string; color?: string; size?: string; shape?: string; json?: boolean }
    ) => {
      const service = new DesignService(loadRepository());
      const intent: DesignIntent = {
        mood: options.mood,
        weight_feeling: options.weight,
        color_feeling: options.color,
        size_implication: options.size,
        primary_shape: options.shape,
      };
      const hasIntent = Object.values(intent).some((v) => v !== undefined);
      const design = service.generateDesign(words.join(' '), hasIntent ? intent : undefined);

      if (options.json) {
        console.log(JSON.stringify(design, null, 2));
        return;
      }
      printDesign(design);
    }
  );

// ============ Archetype Commands ============

program
  .command('archetype <name>')
  .description('Show the design rules for an archetype')
  .action((name: string) => {
    const service = new DesignService(loadRepository());
    const lookup = service.getArchetypeRules(name);
    if (!lookup.found) {
      console.error(chalk.red(`✗ ${lookup.error.message}`));
      console.log(chalk.gray(`  Available: ${lookup.error.available.join(', ')}`));
      process.exit(1);
    }
    const rules = lookup.rules;
    console.log(chalk.bold(`\n${rules.archetype}`));
    console.log(`  Intention:    ${rules.coreIntention}`);
    console.log(`  Composition:  ${rules.compositionPrinciple}`);
    console.log(`  Why it works: ${rules.whyThisWorks}`);
    console.log(`  Keywords:     ${rules.designKeywords.join(', ') || chalk.gray('(none)')}`);
    if (rules.sensoryPrinciples.length > 0) {
      console.log(chalk.bold('\nSensory principles:'));
      for (const principle of rules.sensoryPrinciples) {
        console.log(`  - ${principle}`);
      }
    }
    console.log('');
  });

program
  .command('archetypes')
  .alias('ls')
  .description('List archetypes in catalogue order')
  .action(() => {
    const service = new DesignService(loadRepository());
    console.log(chalk.bold('\nArchetypes:'));
    for (const summary of service.listArchetypes()) {
      console.log(`  ${chalk.cyan(summary.name)} ${chalk.gray(summary.coreIntention)}`);
    }
    console.log('');
  });

program
  .command('taxonomy')
  .description('List design dimensions and their instances')
  .action(() => {
    const repository = loadRepository();
    for (const name of repository.dimensions()) {
      const dimension = repository.dimension(name);
      console.log(chalk.bold(`\n${name}`) + chalk.gray(` ${dimension.description}`));
      for (const instance of dimension.instances) {
        console.log(`  ${instance}`);
      }
    }
    console.log('');
  });

// ============ Web Server ============

program
  .command('serve')
  .description('Start the HTTP API')
  .option('-p, --port <port>', 'Port to listen on', String(DEFAULT_PORT))
  .action(async (options: { port: string }) => {
    const { startWebServer } = await import('./web/server.js');
    const port = parseInt(options.port, 10);
    const repository = loadRepository();

    console.log(chalk.cyan(`Starting kawaii-olog API on port ${port}...`));

    try {
      await startWebServer(repository, { port });
      console.log(chalk.green(`\n✓ API running at http://localhost:${port}`));
      console.log(chalk.gray('  Press Ctrl+C to stop\n'));
    } catch (err) {
      console.error(chalk.red(`✗ Failed to start web server: ${getErrorMessage(err)}`));
      process.exit(1);
    }
  });

export { program };
