import dotenv from 'dotenv';

import { createApp } from './app.js';

dotenv.config();

const app = createApp();

export { app };

if (process.env.NODE_ENV !== 'test') {
  const port = process.env.PORT ? Number(process.env.PORT) : 8080;
  app.listen(port, () => console.log(`Pipeline trigger service listening on :${port}`));
}
