import { buildRelayConfig } from './config';
import { env } from './env';
import { log } from './log';
import { buildServer } from './server';

const config = buildRelayConfig(env);
const { server } = buildServer(config);

server.listen(env.PORT, () => {
  log.info(
    { port: env.PORT, voice: config.voice, turn_detection: config.turnDetection.type, call_log_dir: config.callLogDir },
    'server listening',
  );
});
