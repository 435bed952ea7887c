import { createServer } from 'http';
import next from 'next';
import { loadConfig } from './utils/config';

const config = loadConfig();
const app = next({ dev: config.dev, hostname: config.hostname, port: config.port });
const handle = app.getRequestHandler();

app
  .prepare()
  .then(() => {
    const server = createServer((req, res) => {
      handle(req, res).catch((error: unknown) => {
        console.error('Request handling failed:', error);
        res.statusCode = 500;
        res.end('Internal server error');
      });
    });

    server.listen(config.port, config.hostname, () => {
      console.log(
        `Wheel generator ready on http://${config.hostname}:${config.port} (${config.dev ? 'development' : 'production'})`
      );
    });
  })
  .catch((error: unknown) => {
    console.error('Failed to start server:', error);
    process.exit(1);
  });
