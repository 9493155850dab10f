import pretty from 'pino-pretty';

// Loaded by pino as a transport worker, so the options must stay serializable.
const development = (opts: pretty.PrettyOptions) =>
  pretty({
    ...opts,
    destination: 2,
    translateTime: 'SYS:HH:MM:ss.l',
    ignore: 'hostname,pid',
    customPrettifiers: {
      caller: (caller, _key, _log, { colors }) => `${colors.bold(colors.cyanBright(caller.toString()))}`,
    },
  });

export default development;
