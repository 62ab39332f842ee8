// src/scheduler/tradingHours.ts
// Domestic cash sessions, Asia/Shanghai: Mon-Fri 09:30-11:30 and 13:00-15:00
// (both ends inclusive, minute resolution).

const parts = new Intl.DateTimeFormat("en-US", {
  timeZone: "Asia/Shanghai",
  weekday: "short",
  hour: "2-digit",
  minute: "2-digit",
  hourCycle: "h23",
});

const WEEKEND = new Set(["Sat", "Sun"]);

function shanghaiClock(at: Date) {
  let weekday = "";
  let hour = 0;
  let minute = 0;
  for (const p of parts.formatToParts(at)) {
    if (p.type === "weekday") weekday = p.value;
    else if (p.type === "hour") hour = Number(p.value);
    else if (p.type === "minute") minute = Number(p.value);
  }
  return { weekday, hhmm: hour * 100 + minute };
}

export function isDomesticTradingTime(at: Date = new Date()): boolean {
  const { weekday, hhmm } = shanghaiClock(at);
  if (WEEKEND.has(weekday)) return false;
  return (hhmm >= 930 && hhmm <= 1130) || (hhmm >= 1300 && hhmm <= 1500);
}
