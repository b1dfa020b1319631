import express from "express";

export interface LocalSite {
  url: string;
  close(): Promise<void>;
}

export type SiteServer = (rootDir: string) => Promise<LocalSite>;

/** Serves a directory on an ephemeral loopback port. */
export const serveDirectory: SiteServer = (rootDir) => {
  const app = express();
  app.disable("x-powered-by");
  app.use(express.static(rootDir, { index: "index.html", etag: false }));

  return new Promise((resolve, reject) => {
    const server = app.listen(0, "127.0.0.1");
    server.once("error", reject);
    server.once("listening", () => {
      const address = server.address();
      if (address === null || typeof address === "string") {
        server.close();
        reject(new Error("Static server did not bind a TCP port"));
        return;
      }
      resolve({
        url: `http://127.0.0.1:${address.port}/`,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close((error) => (error ? fail(error) : done()));
          }),
      });
    });
  });
};
