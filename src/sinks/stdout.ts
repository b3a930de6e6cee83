import chalk from 'chalk';
import YAML from 'json-to-pretty-yaml';
import { humanDate } from '../utils/format.js';
import type { LevelName } from '../types.js';

function treeify(input: string, trunk: string = "║") {
  const lines = input.split(/\r?\n/);
  const n = lines.length;

  return lines.map((line, i) => {
    let junction;
    if (n === 1) {
      junction = "─";
    } else if (i === 0) {
      junction = "┌";
    } else if (i === n - 1) {
      junction = "└";
    } else {
      junction = "├";
    }
    return `${trunk} ${junction} ${line}`;
  }).join("\n");
}

export function colorLevel(lvl: string): string {
  switch (lvl) {
    case 'FATAL': return chalk.bgRed.white(lvl);
    case 'ERROR': return chalk.red(lvl);
    case 'WARN':  return chalk.yellow(lvl);
    case 'INFO':  return chalk.green(lvl);
    case 'DEBUG': return chalk.blue(lvl);
    case 'TRACE': return chalk.magenta(lvl);
    case 'VERBOSE': return chalk.gray(lvl);
    default: return lvl;
  }
}

export function colorTopic(topic: string): string {
  const colors = [chalk.cyan, chalk.green, chalk.yellow, chalk.magenta, chalk.blue, chalk.white, chalk.gray];
  let hash = 0;
  for (let i = 0; i < topic.length; i++) hash = (hash * 31 + topic.charCodeAt(i)) >>> 0;
  const color = colors[hash % colors.length];
  return color(`[${topic}]`);
}

function topicLabel(topic: string, data: Record<string, unknown>): string {
  const { router, script } = data;
  if (typeof router === 'string' && typeof script === 'string') return `${router}/${script}/${topic}`;
  if (typeof script === 'string') return `${script}/${topic}`;
  return topic;
}

/**
 * Render one event to stdout and return what was written.
 * JSON line by default; a coloured block with YAML-rendered extras when devPretty.
 */
export function stdoutWrite(
  devPretty: boolean,
  topic: string,
  level: LevelName,
  msg: string,
  data: Record<string, unknown>
): string {
  let out: string;
  if (devPretty) {
    const dateStr = humanDate();
    const topicColored = colorTopic(topicLabel(topic, data));
    const levelColored = colorLevel(level.toUpperCase());
    const { script: _s, router: _r, instance: _i, ...rest } = data;

    if (Object.keys(rest).length > 0) {
      const lines = YAML.stringify(JSON.parse(JSON.stringify(rest))).split('\n').filter((l) => l.trim()).join('\n');
      out = `${dateStr} ${topicColored} ${levelColored} ${msg}\n${treeify(lines, " ")}\n`;
    } else {
      out = `${dateStr} ${topicColored} ${levelColored} ${msg}\n`;
    }
  } else {
    const base = { ts: Math.floor(Date.now() / 1000), level, topic, msg, ...data };
    out = JSON.stringify(base) + '\n';
  }
  process.stdout.write(out);
  return out;
}
