import { Router } from "express";

export default function healthRoutes(gitSha: string) {
  const r = Router();

  r.get("/healthz", (_req, res) => res.send("ok"));
  r.get("/readyz", (_req, res) => res.send("ready"));
  r.get("/version", (_req, res) => res.json({ sha: gitSha }));

  return r;
}
