import { CsvRow } from '../../../utils';

function rawRow(
  team_name: string,
  year: string,
  [wins, losses, ot_losses, win_pct, goals_for, goals_against, goals_diff]: string[],
): CsvRow {
  return {
    team_name,
    year,
    wins,
    losses,
    ot_losses,
    win_pct,
    goals_for,
    goals_against,
    goals_diff,
    scrape_timestamp: '2024-03-09 14:05:07',
  };
}

export const RAW_ROWS: CsvRow[] = [
  rawRow('Boston Bruins', '1990', ['44', '24', '', '0.55', '299', '264', '35']),
  rawRow('Boston Bruins', '1991', ['36', '32', '', '0.45', '270', '275', '-5']),
  rawRow('Detroit Red Wings', '2011', ['48', '28', '6', '0.585', '248', '203', '45']),
  rawRow('Buffalo Sabres', '1990', ['31', '30', '', '0.388', '292', '278', '14']),
];

export const RAW_CSV = [
  'team_name,year,wins,losses,ot_losses,win_pct,goals_for,goals_against,goals_diff,scrape_timestamp',
  'Boston Bruins,1990,44,24,,0.55,299,264,35,2024-03-09 14:05:07',
  'Boston Bruins,1991,36,32,,0.45,270,275,-5,2024-03-09 14:05:08',
  'Detroit Red Wings,2011,48,28,6,0.585,248,203,45,2024-03-09 14:05:09',
  'Buffalo Sabres,1990,31,30,,0.388,292,278,14,2024-03-09 14:05:10',
  '',
].join('\n');
