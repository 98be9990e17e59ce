// app/src/main.ts

import 'dotenv/config';
import { loadConfig } from './lib/config.js';
import { createServer } from './server.js';

const config = loadConfig();
const app = createServer(config);

app.listen(config.port, config.host, () =>
	console.log(`Win probability API on http://${config.host}:${config.port}`)
);
