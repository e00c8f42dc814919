import { z } from 'zod';
import { defineTool } from '@/app/tools/types';

const zoneDescription =
  "Use 'system' or 'local' for the machine's timezone, or an IANA name such as 'America/New_York', 'Europe/London' or 'UTC'.";

export const getCurrentTimeTool = defineTool({
  name: 'get_current_time',
  title: 'Current Time',
  description: 'Get the current time in a timezone (system time by default).',
  inputSchema: {
    timezone: z.string().min(1).default('system').describe(`Timezone to display. ${zoneDescription}`),
  },
  handler: ({ timezone }, { time }) => time.currentTime(timezone),
});

export const convertTimeTool = defineTool({
  name: 'convert_time',
  title: 'Convert Time',
  description: "Convert a time of day (today's date in the source timezone) between timezones.",
  inputSchema: {
    source_timezone: z.string().min(1).describe(`Source timezone. ${zoneDescription}`),
    time: z.string().describe('Time to convert in 24-hour format (HH:MM)'),
    target_timezone: z.string().min(1).describe(`Target timezone. ${zoneDescription}`),
  },
  handler: (args, { time }) => time.convertTime(args.source_timezone, args.time, args.target_timezone),
});
