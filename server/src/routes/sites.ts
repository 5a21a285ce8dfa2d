import express, { Express } from 'express';
import fs from 'fs';
import path from 'path';
import logger from '../utils/logger';
import { SiteConfig } from '../utils/config';
import { ConfigError } from '../utils/errors';

function joinPattern(...parts: string[]): string {
  return parts.join('/').replace(/\/{2,}/g, '/');
}

/**
 * Mount the configured static and SPA locations.
 *
 * Longer patterns are mounted first so the most specific location wins, the
 * same way a longest-prefix router would pick it. SPA client routes listed in
 * `paths` (and anything below them) are answered with the base page.
 */
export function mountSites(app: Express, locations: Record<string, SiteConfig>): void {
  const patterns = Object.keys(locations).sort((a, b) => b.length - a.length);

  for (const pattern of patterns) {
    const site = locations[pattern];
    const dir = path.resolve(site.dir);
    if (!fs.existsSync(dir)) {
      throw new ConfigError([`locations.${pattern}: ${site.type} directory does not exist: ${site.dir}`]);
    }

    if (site.type === 'spa') {
      const baseFile = path.join(dir, site.basepage);
      if (!fs.existsSync(baseFile)) {
        throw new ConfigError([`locations.${pattern}: spa base file does not exist: ${baseFile}`]);
      }
      for (const clientPath of site.paths) {
        const route = joinPattern(pattern, clientPath, '/');
        app.get([route, `${route}*`], (_req, res) => res.sendFile(baseFile));
        logger.info({ type: site.type, route, file: baseFile }, 'serving spa route');
      }
    }

    app.use(pattern, express.static(dir));
    logger.info({ type: site.type, pattern, dir }, 'serving site');
  }
}
