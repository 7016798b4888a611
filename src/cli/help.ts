import type { Command } from 'commander';
import kleur from 'kleur';

type Stylizer = (text: string) => string;

interface HelpColors {
  banner: Stylizer;
  subtitle: Stylizer;
  section: Stylizer;
  bullet: Stylizer;
  command: Stylizer;
  option: Stylizer;
  description: Stylizer;
  muted: Stylizer;
  accent: Stylizer;
}

const createColorWrapper = (isTty: boolean) => (styler: Stylizer): Stylizer => (text) =>
  isTty ? styler(text) : text;

export function applyHelpStyling(program: Command, version: string, isTty: boolean): void {
  const wrap = createColorWrapper(isTty);
  const colors: HelpColors = {
    banner: wrap((text) => kleur.bold().blue(text)),
    subtitle: wrap((text) => kleur.dim(text)),
    section: wrap((text) => kleur.bold().white(text)),
    bullet: wrap((text) => kleur.blue(text)),
    command: wrap((text) => kleur.bold().blue(text)),
    option: wrap((text) => kleur.cyan(text)),
    description: wrap((text) => kleur.white(text)),
    muted: wrap((text) => kleur.gray(text)),
    accent: wrap((text) => kleur.cyan(text)),
  };

  program.configureHelp({
    styleTitle(title) {
      return colors.section(title);
    },
    styleDescriptionText(text) {
      return colors.description(text);
    },
    styleCommandText(text) {
      return colors.command(text);
    },
    styleOptionText(text) {
      return colors.option(text);
    },
  });

  program.addHelpText('beforeAll', () => renderHelpBanner(version, colors));
  program.addHelpText('after', () => renderHelpFooter(program, colors));
}

function renderHelpBanner(version: string, colors: HelpColors): string {
  const subtitle = 'randomized Bing searches in a copy of your Edge profile';
  return `${colors.banner(`edge-autosearch v${version}`)} ${colors.subtitle(`- ${subtitle}`)}\n`;
}

function renderHelpFooter(program: Command, colors: HelpColors): string {
  const tips = [
    `${colors.bullet('•')} Edge keeps its profile files locked while it runs; the searches always use a copy.`,
    `${colors.bullet('•')} ${colors.accent('--policy operator')} waits for you to copy the profile to ${colors.accent('"<profile>-temp"')} and reuses that copy on later runs.`,
    `${colors.bullet('•')} ${colors.accent('--policy automatic')} copies to a temporary folder and can close Edge processes that hold files open (needs lsof or Sysinternals handle).`,
    `${colors.bullet('•')} Defaults live in ${colors.accent('~/.edge-autosearch/config.json')} (JSON5); flags win over the file.`,
  ].join('\n');

  const formatExample = (command: string, description: string): string =>
    `${colors.command(`  ${command}`)}\n${colors.muted(`    ${description}`)}`;

  const examples = [
    formatExample(`${program.name()}`, 'Pick a profile, a search count and a copy policy interactively.'),
    formatExample(
      `${program.name()} --profile 2 --count 10 --policy automatic`,
      'Run 10 searches with the second profile, copying it automatically.',
    ),
    formatExample(
      `${program.name()} --queries my-queries.txt --wait-for-login --verbose`,
      'Use your own query list and give yourself time to sign in to Bing first.',
    ),
  ].join('\n\n');

  return `
${colors.section('Tips')}
${tips}

${colors.section('Examples')}
${examples}
`;
}
