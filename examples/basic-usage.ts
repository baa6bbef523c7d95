/**
 * Basic CloudShelf Example
 *
 * Connects with a token from the environment, writes a few payloads
 * and reads them back.
 */

import { consoleLogger, DataFrame, withShelf } from '../src';

async function main() {
  const token = process.env.DROPBOX_TOKEN ?? '';

  await withShelf(token, { logger: consoleLogger }, async (shelf) => {
    // Plain text
    await shelf.writeFile('Quarterly numbers attached.', 'reports/README.txt');
    console.log(await shelf.readFile('reports/README.txt'));

    // YAML keeps key order
    await shelf.writeYaml({ region: 'emea', limits: { rows: 500 } }, 'reports/settings.yaml');
    const settings = await shelf.readYaml('reports/settings.yaml');
    console.log('Settings keys:', [...settings.keys()]);

    // Tables
    const sales = DataFrame.fromColumns({
      month: ['Jan', 'Feb', 'Mar'],
      units: [120, 98, 143],
    });
    await shelf.writeExcel(sales, 'reports/sales.xlsx', { index: false, sheetName: 'Q1' });
    await shelf.writeParquet(sales, 'reports/sales.parquet');

    const fromParquet = await shelf.readParquet('reports/sales.parquet');
    console.log('Parquet dtypes:', fromParquet.dtypes);

    // Listing
    for (const entry of await shelf.ls('reports')) {
      console.log(`${entry.type.padEnd(6)} ${entry.path}`);
    }
  });
}

main().catch(console.error);
