
import express from "express";
import { Server } from "http";
import { Config } from "../config";
import { Logger } from "../helpers/logger";

/**
 * Webserver for health and metrics endpoints
 */
export class WebServer {

  private readonly logger = new Logger("web");
  private server?: Server;

  /**
   * Builds the app; `setup` registers extra routes, such as /metrics, before the fallbacks
   */
  public async createApp(setup?: (app: express.Application) => Promise<void>): Promise<express.Application> {
    const app = express();

    app.get("/health", (req, res) => {
      res.status(200).send("healthy");
    });

    if (setup) {
      await setup(app);
    }

    app.use((req, res) => {
      res.status(404).send(`
      <html>
      <head>
      <title>${Config.info.name}</title>
      </head>
      <body>
      <h1>${Config.info.name}</h1>
      <ul>
      <li><a href="/metrics">/metrics</a></li>
      <li><a href="/health">/health</a></li>
      </ul>
      </body>
      </html>`);
    });

    app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
      this.logger.error(err);
      res.status(500).send(`Internal server error`);
    });

    return app;
  }

  public async init(setup?: (app: express.Application) => Promise<void>): Promise<void> {
    const app = await this.createApp(setup);

    await new Promise<void>((resolve, reject) => {
      this.server = app.listen(Config.server.port, () => {
        this.logger.info(`Server ready at http://localhost:` + Config.server.port);
        resolve();
      }).on('error', (err) => {
        reject(err);
      });
    });
  }

  public close(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (!this.server) {
        return resolve();
      }
      this.server.close(err => err ? reject(err) : resolve());
    });
  }

}
