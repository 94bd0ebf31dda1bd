import 'dotenv/config';
import { loadConfig } from '../Platform/Config.js';
import { Engine } from '../Platform/Engine.js';
import { ApiServer } from './Server.js';

async function bootstrap() {
    const config = loadConfig();
    const engine = Engine.fromConfig(config);
    const server = new ApiServer(engine, config.port);
    await server.start();
}

bootstrap().catch(console.error);
