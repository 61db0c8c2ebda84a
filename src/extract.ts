import { load, type Cheerio, type CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { ExtractionError } from './errors.js';
import { canonicalText } from './lib/canon.js';
import { DERIVED_LABELS, fieldForLabel, movementForHeadline, movementForLabel } from './lib/labels.js';
import type { Movement, RawPage, RawRow } from './types/index.js';

const PLAYER_LINK = /\/spieler\/\d+/;
const TRANSFER_LINK = /transfer_id\/\d+/;
const CLUB_LINK = /\/verein\/\d+/;
const NAME_LINK_SELECTOR = 'a[href*="/profil/spieler/"], a[href*="/verein/"]';
const FLAG_SELECTOR = 'img.flaggenrahmen[title], img[class*="flag"][title]';

interface TransferTable {
  movement: Movement;
  labels: string[];
  rows: Element[];
}

function colspan($cell: Cheerio<Element>): number {
  const parsed = Number.parseInt($cell.attr('colspan') ?? '1', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : 1;
}

function readHeaderLabels($: CheerioAPI, $table: Cheerio<Element>): string[] {
  let $headerCells = $table.children('thead').children('tr').first().children('th');
  if (!$headerCells.length) {
    $headerCells = $table.find('tr').first().children('th');
  }

  const labels: string[] = [];
  const seen = new Map<string, number>();
  $headerCells.each((_, th) => {
    const $th = $(th);
    const text = canonicalText($th.text()) || canonicalText($th.attr('title'));
    const span = colspan($th);
    for (let i = 0; i < span; i++) {
      const base = text || `column ${labels.length + 1}`;
      const count = seen.get(base) ?? 0;
      seen.set(base, count + 1);
      labels.push(count ? `${base} #${count + 1}` : base);
    }
  });
  return labels;
}

function readHeadline($table: Cheerio<Element>): string {
  const $box = $table.closest('.box');
  const $headline = $box.length
    ? $box.find('h2, .content-box-headline').first()
    : $table.prevAll('h2, h3').first();
  return canonicalText($headline.text());
}

function findTransferTables($: CheerioAPI): TransferTable[] {
  const tables: TransferTable[] = [];
  for (const table of $('table').toArray()) {
    const $table = $(table);
    if ($table.parents('table').length) continue;

    const labels = readHeaderLabels($, $table);
    const movement = (labels.length ? movementForLabel(labels[0]) : undefined) ?? movementForHeadline(readHeadline($table));
    if (!movement || !labels.length) continue;

    const rows = $table.children('tbody').children('tr').toArray();
    tables.push({ movement, labels, rows });
  }
  return tables;
}

function cellText($: CheerioAPI, $cell: Cheerio<Element>): string {
  const linkText = $cell
    .find(NAME_LINK_SELECTOR)
    .toArray()
    .map((anchor) => canonicalText($(anchor).text()))
    .find(Boolean);
  if (linkText) return linkText;

  const text = canonicalText($cell.text());
  if (text) return text;

  return $cell
    .find('img[title]')
    .toArray()
    .map((img) => canonicalText($(img).attr('title')))
    .filter(Boolean)
    .join('/');
}

// Compact layouts print the position under the name, inside the player cell.
function inlinePosition($cell: Cheerio<Element>): string {
  const $lines = $cell.find('table.inline-table tr');
  if ($lines.length < 2) return '';
  return canonicalText($lines.last().text());
}

function firstHref($: CheerioAPI, $row: Cheerio<Element>, pattern: RegExp, exclude?: RegExp): string {
  for (const anchor of $row.find('a[href]').toArray()) {
    const href = $(anchor).attr('href') ?? '';
    if (pattern.test(href) && !(exclude && exclude.test(href))) return href;
  }
  return '';
}

function readRow($: CheerioAPI, table: TransferTable, row: Element, index: number): RawRow | undefined {
  const $row = $(row);
  const $cells = $row.children('td');
  // "No arrivals" placeholders and header rows carry at most one cell.
  if ($cells.length <= 1) return undefined;

  const playerHref = firstHref($, $row, PLAYER_LINK, TRANSFER_LINK);
  if (!playerHref) return undefined;

  const cells: Record<string, string> = {};
  for (const label of table.labels) cells[label] = '';

  const dealingCells: Cheerio<Element>[] = [];
  let playerPosition = '';
  let column = 0;
  $cells.each((_, td) => {
    const $cell = $(td);
    const label = table.labels[column] ?? `column ${column + 1}`;
    cells[label] = cellText($, $cell);
    const field = fieldForLabel(label);
    if (field === 'dealing_club') dealingCells.push($cell);
    if (field === 'player_name' && !playerPosition) playerPosition = inlinePosition($cell);
    column += colspan($cell);
  });

  const dealingFlags = dealingCells.flatMap(($cell) =>
    $cell
      .find(FLAG_SELECTOR)
      .toArray()
      .map((img) => canonicalText($(img).attr('title')))
      .filter(Boolean)
  );

  cells[DERIVED_LABELS.playerHref] = playerHref;
  cells[DERIVED_LABELS.dealingClubHref] = firstHref($, $row, CLUB_LINK);
  cells[DERIVED_LABELS.transferHref] = firstHref($, $row, TRANSFER_LINK);
  cells[DERIVED_LABELS.dealingCountry] = dealingFlags[dealingFlags.length - 1] ?? '';
  cells[DERIVED_LABELS.playerPosition] = playerPosition;

  return { movement: table.movement, index, cells };
}

/**
 * Reads the arrivals and departures tables of a club transfer page into
 * label-keyed rows. Throws `ExtractionError` when no transfer table is
 * recognized, which means the page layout changed.
 */
export function extract(page: RawPage): RawRow[] {
  const $ = load(page.body);
  const tables = findTransferTables($);
  if (!tables.length) {
    throw new ExtractionError('No transfer table recognized on page', {
      code: 'TABLE_NOT_FOUND',
      details: { url: page.url, club: page.job.club.name, title: canonicalText($('title').text()) }
    });
  }

  const rows: RawRow[] = [];
  for (const table of tables) {
    for (const row of table.rows) {
      const parsed = readRow($, table, row, rows.length);
      if (parsed) rows.push(parsed);
    }
  }
  return rows;
}
