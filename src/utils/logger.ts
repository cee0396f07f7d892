import pino from 'pino';
import pretty from 'pino-pretty';
import chalk from 'chalk';

// --- Color Helper ---
const moduleColors: Record<string, chalk.Chalk> = {
  'System': chalk.magenta.bold,
  'Config': chalk.yellow.bold,
  'HTTP': chalk.blue.bold,
  'Registry': chalk.cyan.bold,
  'Knowledge': chalk.green.bold,
  'Retriever': chalk.hex('#FFA500').bold, // Orange
  'Archive': chalk.hex('#8A2BE2').bold,   // BlueViolet
};

const getColor = (moduleName: string): chalk.Chalk => {
  // Sub-modules (e.g. Knowledge:GCS) share the base module colour
  const baseModule = moduleName.split(':')[0];
  if (moduleColors[baseModule]) return moduleColors[baseModule];

  // Hash to pick a consistent color
  const colors = [chalk.red, chalk.green, chalk.yellow, chalk.blue, chalk.magenta, chalk.cyan];
  let hash = 0;
  for (let i = 0; i < moduleName.length; i++) {
    hash = moduleName.charCodeAt(i) + ((hash << 5) - hash);
  }
  return colors[Math.abs(hash) % colors.length].bold;
};

const prettyStream = pretty({
  colorize: true,
  translateTime: 'SYS:standard',
  ignore: 'pid,hostname,module',
  messageFormat: (log, messageKey) => {
    const raw = log[messageKey];
    const msg = typeof raw === 'string' ? raw : String(raw ?? '');
    let moduleName = typeof log.module === 'string' ? log.module : '';
    let finalMsg = msg;

    // Matches [Module] or [Module:SubModule] at the start
    if (!moduleName && msg.trim().startsWith('[')) {
      const match = msg.trim().match(/^\[([^\]]+)\]/);
      if (match) {
        moduleName = match[1];
        finalMsg = msg.replace(match[0], '').trim();
      }
    }

    if (moduleName) {
      const color = getColor(moduleName);
      return `${color(`[${moduleName}]`)} ${finalMsg}`;
    }

    return finalMsg;
  }
});

const logger = pino(
  {
    level: process.env.LOG_LEVEL || 'info',
    base: { pid: false },
  },
  prettyStream
);

export type Logger = pino.Logger;

export default logger;
