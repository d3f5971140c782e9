/**
 * @fileoverview Command-line interface over the STRING bridge.
 *
 * Usage:
 *   string-db map <identifiers...>         Map names to STRING ids
 *   string-db network <identifiers...>     Print interactions (JSON or a text export)
 *   string-db image <identifiers...>       Write a network image to --output
 *   string-db enrichment <identifiers...>  Print functional enrichment terms
 *   string-db version                      Print the STRING version
 *   string-db demo                         Run a small end-to-end example
 *
 * @module src/cli/program
 */
import { writeFile as fsWriteFile } from 'node:fs/promises';

import { Command, CommanderError, InvalidArgumentError } from 'commander';

import { SERVER_VERSION } from '@/config/index.js';
import type { StringDbService } from '@/services/string-db/core/StringDbService.js';
import {
  OutputFormat,
  type NetworkExportFormat,
  type NetworkImageFormat,
} from '@/services/string-db/types.js';
import { McpError } from '@/types-global/errors.js';
import { requestContextService, type RequestContext } from '@/utils/index.js';

/** Genes used by `demo`: the p53 / DNA-damage neighbourhood in human. */
export const DEMO_IDENTIFIERS = ['TP53', 'BRCA1', 'EGFR', 'MDM2'];
export const DEMO_SPECIES = 9606;

const NETWORK_FORMATS = [
  OutputFormat.JSON,
  OutputFormat.TSV,
  OutputFormat.TSV_NO_HEADER,
  OutputFormat.XML,
  OutputFormat.PSI_MI,
  OutputFormat.PSI_MI_TAB,
] as const;

const IMAGE_FORMATS = [
  OutputFormat.IMAGE,
  OutputFormat.HIGHRES_IMAGE,
  OutputFormat.SVG,
] as const;

type NetworkCliFormat = (typeof NETWORK_FORMATS)[number];

export interface CliIo {
  out(text: string): void;
  err(text: string): void;
  writeFile(path: string, data: Uint8Array): Promise<void>;
}

export interface CliDependencies {
  /**
   * Called only when a command runs, so `--help` works with an invalid
   * environment.
   */
  getService(): StringDbService;
  io?: CliIo;
}

const processIo: CliIo = {
  out: (text) => {
    process.stdout.write(text.endsWith('\n') ? text : `${text}\n`);
  },
  err: (text) => {
    process.stderr.write(text.endsWith('\n') ? text : `${text}\n`);
  },
  writeFile: (path, data) => fsWriteFile(path, data),
};

interface SpeciesOpts {
  species?: number;
}

interface NetworkOpts extends SpeciesOpts {
  requiredScore?: number;
  format: NetworkCliFormat;
}

interface ImageOpts extends SpeciesOpts {
  requiredScore?: number;
  format: NetworkImageFormat;
  output: string;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function choice<T extends string>(allowed: readonly T[]) {
  return (value: string): T => {
    const match = allowed.find((candidate) => candidate === value);
    if (match === undefined) {
      throw new InvalidArgumentError(`Allowed: ${allowed.join(', ')}.`);
    }
    return match;
  };
}

function isExportFormat(format: NetworkCliFormat): format is NetworkExportFormat {
  return format !== OutputFormat.JSON;
}

function cliContext(command: string): RequestContext {
  return requestContextService.createRequestContext({
    operation: `cli:${command}`,
  });
}

function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

/**
 * Builds the commander program. Actions throw on failure; {@link runCli}
 * turns that into an exit code.
 */
export function createProgram(deps: CliDependencies): Command {
  const io = deps.io ?? processIo;
  const program = new Command();

  program
    .name('string-db')
    .description(
      'Query the STRING protein-protein interaction database from the command line.',
    )
    .version(SERVER_VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.out(text),
      writeErr: (text) => io.err(text),
    });

  // ─── map ─────────────────────────────────────────────────────────────
  program
    .command('map')
    .description('Map gene names or accessions to STRING identifiers')
    .argument('<identifiers...>', 'Gene names, UniProt accessions, …')
    .option('-s, --species <taxon>', 'NCBI taxonomy id', parseInteger)
    .action(async (identifiers: string[], opts: SpeciesOpts) => {
      const mappings = await deps
        .getService()
        .mapIdentifiers(
          identifiers,
          { species: opts.species, echoQuery: true },
          cliContext('map'),
        );
      io.out(toJson(mappings));
    });

  // ─── network ─────────────────────────────────────────────────────────
  program
    .command('network')
    .description('Print the interaction network among the given proteins')
    .argument('<identifiers...>', 'Proteins to include')
    .option('-s, --species <taxon>', 'NCBI taxonomy id', parseInteger)
    .option(
      '-r, --required-score <score>',
      'Minimum combined score (0-1000)',
      parseInteger,
    )
    .option(
      '-f, --format <format>',
      `Output format: ${NETWORK_FORMATS.join(', ')}`,
      choice(NETWORK_FORMATS),
      OutputFormat.JSON,
    )
    .action(async (identifiers: string[], opts: NetworkOpts) => {
      const service = deps.getService();
      const context = cliContext('network');
      const common = {
        species: opts.species,
        requiredScore: opts.requiredScore,
      };

      if (isExportFormat(opts.format)) {
        const exported = await service.exportNetwork(
          identifiers,
          { ...common, format: opts.format },
          context,
        );
        io.out(exported.content);
        return;
      }

      const interactions = await service.getNetworkInteractions(
        identifiers,
        common,
        context,
      );
      io.out(toJson(interactions));
    });

  // ─── image ───────────────────────────────────────────────────────────
  program
    .command('image')
    .description('Render the network as an image file')
    .argument('<identifiers...>', 'Proteins to include')
    .requiredOption('-o, --output <file>', 'Destination file')
    .option('-s, --species <taxon>', 'NCBI taxonomy id', parseInteger)
    .option(
      '-r, --required-score <score>',
      'Minimum combined score (0-1000)',
      parseInteger,
    )
    .option(
      '-f, --format <format>',
      `Image format: ${IMAGE_FORMATS.join(', ')}`,
      choice(IMAGE_FORMATS),
      OutputFormat.IMAGE,
    )
    .action(async (identifiers: string[], opts: ImageOpts) => {
      const image = await deps.getService().getNetworkImage(
        identifiers,
        {
          species: opts.species,
          requiredScore: opts.requiredScore,
          format: opts.format,
        },
        cliContext('image'),
      );
      await io.writeFile(opts.output, image.data);
      io.out(
        `Wrote ${image.data.byteLength} bytes (${image.mimeType}) to ${opts.output}`,
      );
    });

  // ─── enrichment ──────────────────────────────────────────────────────
  program
    .command('enrichment')
    .description('Run functional enrichment on a protein set')
    .argument('<identifiers...>', 'Proteins forming the set')
    .option('-s, --species <taxon>', 'NCBI taxonomy id', parseInteger)
    .action(async (identifiers: string[], opts: SpeciesOpts) => {
      const terms = await deps
        .getService()
        .getFunctionalEnrichment(
          identifiers,
          { species: opts.species },
          cliContext('enrichment'),
        );
      io.out(toJson(terms));
    });

  // ─── version ─────────────────────────────────────────────────────────
  program
    .command('version')
    .description('Print the STRING database version')
    .action(async () => {
      const versions = await deps
        .getService()
        .getVersionInfo(cliContext('version'));
      io.out(toJson(versions));
    });

  // ─── demo ────────────────────────────────────────────────────────────
  program
    .command('demo')
    .description(
      `Map, fetch the network and enrich ${DEMO_IDENTIFIERS.join(', ')} (human)`,
    )
    .action(async () => {
      const service = deps.getService();
      const context = cliContext('demo');

      const mappings = await service.mapIdentifiers(
        DEMO_IDENTIFIERS,
        { species: DEMO_SPECIES },
        context,
      );
      io.out(`Mapped ${mappings.length}/${DEMO_IDENTIFIERS.length} identifiers:`);
      for (const m of mappings) {
        io.out(`  ${m.queryItem} -> ${m.stringId} (${m.preferredName})`);
      }

      const stringIds = mappings.map((m) => m.stringId);
      const interactions = await service.getNetworkInteractions(
        stringIds,
        { species: DEMO_SPECIES },
        context,
      );
      io.out(`Network: ${interactions.length} interaction(s)`);
      for (const edge of interactions) {
        io.out(
          `  ${edge.preferredName_A} - ${edge.preferredName_B} (score ${edge.score})`,
        );
      }

      const terms = await service.getFunctionalEnrichment(
        stringIds,
        { species: DEMO_SPECIES },
        context,
      );
      io.out(`Enrichment: ${terms.length} term(s)`);
      for (const term of terms.slice(0, 5)) {
        io.out(`  [${term.category}] ${term.term} ${term.description}`);
      }
    });

  return program;
}

/**
 * Runs the CLI and resolves to the process exit code.
 */
export async function runCli(
  argv: string[],
  deps: CliDependencies,
): Promise<number> {
  const io = deps.io ?? processIo;
  const program = createProgram(deps);

  try {
    await program.parseAsync(argv, { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      // Help and version output exit through here with code 0.
      return error.exitCode;
    }
    const message = error instanceof Error ? error.message : String(error);
    const code = error instanceof McpError ? ` [${error.code}]` : '';
    io.err(`Error${code}: ${message}`);
    return 1;
  }
}
