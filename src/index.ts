import { env } from './config/env';
import { createApp } from './app';

const app = createApp({
  corsOrigin: env.frontendUrl,
  logRequests: env.nodeEnv !== 'test',
});

app.listen(env.port, () => {
  console.log(`🚀 Server is running on http://localhost:${env.port}`);
  console.log(`📝 Environment: ${env.nodeEnv}`);
});

export default app;
