const MONTHS = [
  "Jan",
  "Feb",
  "Mar",
  "Apr",
  "May",
  "Jun",
  "Jul",
  "Aug",
  "Sep",
  "Oct",
  "Nov",
  "Dec",
];

const pad = (value: number) => value.toString().padStart(2, "0");

// "Sat Jul 16 01:12:54 -0500 2022"
const POST_DATE =
  /^\w{3} (\w{3}) (\d{1,2}) (\d{2}):(\d{2}):(\d{2}) ([+-])(\d{2})(\d{2}) (\d{4})$/;

// "2021-08-15 13:52", server time taken as UTC
const COMMENT_DATE = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2})(?::(\d{2}))?$/;

export function parsePostDate(value: string): Date {
  const match = POST_DATE.exec(value.trim());
  if (!match) return new Date(value);

  const [, mon, day, hh, mm, ss, sign, tzH, tzM, year] = match;
  const month = MONTHS.indexOf(mon) + 1;
  if (month === 0) return new Date(Number.NaN);

  return new Date(
    `${year}-${pad(month)}-${pad(Number(day))}T${hh}:${mm}:${ss}${sign}${tzH}:${tzM}`,
  );
}

export function parseCommentDate(value: string): Date {
  const match = COMMENT_DATE.exec(value.trim());
  if (!match) return new Date(value);

  const [, year, month, day, hh, mm, ss] = match;
  return new Date(
    Date.UTC(
      Number(year),
      Number(month) - 1,
      Number(day),
      Number(hh),
      Number(mm),
      Number(ss ?? 0),
    ),
  );
}
