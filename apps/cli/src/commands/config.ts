import pc from 'picocolors';
import { getFlag, hasFlag, UsageError } from '../args';
import type { CliContext } from '../context';

const CONFIG_USAGE = 'config needs one of --list, --reset, --export FILE, --import FILE, --add-rule CATEGORY EXTS, --remove-rule CATEGORY';

export async function runConfig(args: string[], ctx: CliContext): Promise<void> {
  const { store } = ctx;

  if (hasFlag(args, '--list')) {
    printConfig(ctx);
    return;
  }

  if (hasFlag(args, '--reset')) {
    store.reset();
    console.log('Settings reset to defaults');
    return;
  }

  const exportFile = getFlag(args, '--export');
  if (exportFile) {
    store.exportTo(exportFile);
    console.log(`Settings exported to ${exportFile}`);
    return;
  }

  const importFile = getFlag(args, '--import');
  if (importFile) {
    store.importFrom(importFile);
    console.log(`Settings imported from ${importFile}`);
    return;
  }

  const addIdx = args.indexOf('--add-rule');
  if (addIdx !== -1) {
    const category = args[addIdx + 1];
    const extensions = args[addIdx + 2];
    if (!category || !extensions) {
      throw new UsageError('--add-rule expects CATEGORY and a comma-separated extension list');
    }
    const ruleSet = store.addRule(category, extensions.split(','));
    console.log(`Rule added: ${category.trim()} -> ${ruleSet.extensionsFor(category.trim()).join(', ')}`);
    return;
  }

  const removeCategory = getFlag(args, '--remove-rule');
  if (removeCategory) {
    if (store.removeRule(removeCategory)) {
      console.log(`Rule removed: ${removeCategory}`);
    } else {
      throw new UsageError(`No rule for category "${removeCategory}"`);
    }
    return;
  }

  throw new UsageError(CONFIG_USAGE);
}

function printConfig(ctx: CliContext): void {
  const summary = ctx.store.summary();
  const settings = ctx.store.getSettings();

  console.log(`Settings file: ${ctx.store.getConfigPath()}`);
  console.log(`  Categories:       ${summary.totalCategories}`);
  console.log(`  Extensions:       ${summary.totalExtensions}`);
  console.log(`  Organize by date: ${summary.organizeByDate ? `yes (${settings.dateFormat})` : 'no'}`);
  console.log(`  Default category: ${summary.defaultCategory}`);
  console.log(`  Watch delay:      ${settings.monitor.delayMs} ms`);

  console.log('\nRules:');
  for (const [category, extensions] of Object.entries(settings.fileTypes)) {
    console.log(`  ${pc.bold(category)}: ${extensions.join(', ')}`);
  }

  if (settings.excludedExtensions.length > 0 || settings.excludedPatterns.length > 0) {
    console.log('\nExcluded:');
    console.log(`  Extensions: ${settings.excludedExtensions.join(', ') || '-'}`);
    console.log(`  Names:      ${settings.excludedPatterns.join(', ') || '-'}`);
  }
}
