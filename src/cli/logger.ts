import chalk from 'chalk';

/** Section title for human-readable output */
export function heading(title: string) {
  console.log('\n' + chalk.bold.blue(title));
}

export function kv(label: string, value: string) {
  console.log('  ' + chalk.gray(label + ':') + ' ' + chalk.white(value));
}

export const render = {
  line(msg = '') {
    console.log(msg);
  },
  /** Wire JSON, two-space indented */
  json(value: unknown) {
    console.log(JSON.stringify(value, null, 2));
  },
  warn(msg: string) {
    console.log(chalk.yellow('⚠ ' + msg));
  },
};
