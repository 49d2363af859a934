/**
 * AppleScriptObjC builders for the EventKit store
 *
 * EventKit's reminder fetch only offers a completion-block API, which
 * AppleScriptObjC cannot call, so listing enumerates ids through the
 * Reminders scripting dictionary and resolves each one with the
 * synchronous calendarItemWithIdentifier:. Flagged state is only
 * exposed by the scripting dictionary.
 *
 * Every script prints JSON.
 */

import type { StoreReminderChanges, StoreReminderDraft } from './types.js';
import { toEventKitPriority } from '../utils/priority.js';

/** EKEntityTypeReminder */
const ENTITY_TYPE_REMINDER = 1;
/** EKAuthorizationStatusFullAccess */
const STATUS_FULL_ACCESS = 3;
/** Year | Month | Day | Hour | Minute | Second calendar units */
const DUE_DATE_UNITS = 4 | 8 | 16 | 32 | 64 | 128;

export const REMINDER_URL_PREFIX = 'x-apple-reminder://';

/**
 * Escape special characters for an AppleScript string literal
 */
export function escapeAppleScript(str: string): string {
  return str.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

function quote(str: string): string {
  return `"${escapeAppleScript(str)}"`;
}

function epochSeconds(date: Date): string {
  return String(date.getTime() / 1000);
}

const PRELUDE = `use AppleScript version "2.7"
use framework "Foundation"
use framework "AppKit"
use framework "EventKit"
use scripting additions

on openStore()
  set theStore to current application's EKEventStore's alloc()'s init()
  theStore's requestFullAccessToRemindersWithCompletion:(missing value)
  delay 0.5
  set theStatus to (current application's EKEventStore's authorizationStatusForEntityType:${ENTITY_TYPE_REMINDER}) as integer
  if theStatus is not ${STATUS_FULL_ACCESS} then error "Reminders access denied (status " & theStatus & ")" number -1743
  return theStore
end openStore

on nullable(theValue)
  if theValue is missing value then return current application's NSNull's |null|()
  return theValue
end nullable

on epochOf(theDate)
  if theDate is missing value then return current application's NSNull's |null|()
  return theDate's timeIntervalSince1970()
end epochOf

on flaggedIds()
  tell application "Reminders" to return id of every reminder whose flagged is true
end flaggedIds

on setFlagged(theIdentifier, theFlag)
  tell application "Reminders" to set flagged of reminder id ("${REMINDER_URL_PREFIX}" & theIdentifier) to theFlag
end setFlagged

on findReminder(theStore, theIdentifier)
  set theItem to theStore's calendarItemWithIdentifier:theIdentifier
  if theItem is missing value then return missing value
  if not ((theItem's isKindOfClass:(current application's EKReminder)) as boolean) then return missing value
  return theItem
end findReminder

on saveReminder(theStore, theReminder)
  set {theSaved, theError} to theStore's saveReminder:theReminder commit:true |error|:(reference)
  if not (theSaved as boolean) then error "Failed to save reminder: " & ((theError's localizedDescription()) as text)
end saveReminder

on reminderRecord(theReminder, theFlagged)
  set theIdentifier to (theReminder's calendarItemIdentifier()) as text
  set theDue to missing value
  set theComponents to theReminder's dueDateComponents()
  if theComponents is not missing value then
    set theDue to current application's NSCalendar's currentCalendar()'s dateFromComponents:theComponents
  end if
  set theURL to theReminder's URL()
  if theURL is not missing value then set theURL to theURL's absoluteString()
  set theValues to {theIdentifier, my nullable(theReminder's title()), my nullable(theReminder's notes()), my nullable(theURL), my epochOf(theDue), theReminder's priority(), (theReminder's isCompleted()) as boolean, my epochOf(theReminder's completionDate()), (theFlagged contains ("${REMINDER_URL_PREFIX}" & theIdentifier)), my epochOf(theReminder's creationDate()), my epochOf(theReminder's lastModifiedDate()), (theReminder's calendar()'s calendarIdentifier()) as text}
  set theKeys to {"id", "title", "notes", "url", "dueDate", "priority", "completed", "completionDate", "flagged", "creationDate", "modificationDate", "calendarId"}
  return current application's NSDictionary's dictionaryWithObjects:theValues forKeys:theKeys
end reminderRecord

on toJSON(theObject)
  set {theData, theError} to current application's NSJSONSerialization's dataWithJSONObject:theObject options:0 |error|:(reference)
  if theData is missing value then error ((theError's localizedDescription()) as text)
  return (current application's NSString's alloc()'s initWithData:theData encoding:(current application's NSUTF8StringEncoding)) as text
end toJSON
`;

function script(body: string): string {
  return `${PRELUDE}\n${body.trim()}\n`;
}

/**
 * Setter lines for the fields present in `changes`
 */
export function buildSetters(changes: StoreReminderChanges): string[] {
  const lines: string[] = [];

  if (changes.title !== undefined) {
    lines.push(`theReminder's setTitle:${quote(changes.title)}`);
  }

  if (changes.notes !== undefined) {
    lines.push(
      changes.notes === null
        ? `theReminder's setNotes:(missing value)`
        : `theReminder's setNotes:${quote(changes.notes)}`
    );
  }

  if (changes.url !== undefined) {
    lines.push(
      changes.url === null
        ? `theReminder's setURL:(missing value)`
        : `theReminder's setURL:(current application's NSURL's URLWithString:${quote(changes.url)})`
    );
  }

  if (changes.dueDate !== undefined) {
    lines.push(
      changes.dueDate === null
        ? `theReminder's setDueDateComponents:(missing value)`
        : `theReminder's setDueDateComponents:(current application's NSCalendar's currentCalendar()'s components:${DUE_DATE_UNITS} fromDate:(current application's NSDate's dateWithTimeIntervalSince1970:${epochSeconds(changes.dueDate)}))`
    );
  }

  if (changes.priority !== undefined) {
    lines.push(`theReminder's setPriority:${toEventKitPriority(changes.priority)}`);
  }

  if (changes.completed !== undefined) {
    lines.push(`theReminder's setCompleted:${changes.completed}`);
  }

  return lines;
}

function flaggedLine(flagged: boolean | undefined): string {
  return flagged === undefined ? '' : `my setFlagged(theIdentifier, ${flagged})`;
}

export function buildAccessScript(): string {
  return script(`
my openStore()
return "true"`);
}

export function buildCalendarsScript(): string {
  return script(`
set theStore to my openStore()
set theCalendars to theStore's calendarsForEntityType:${ENTITY_TYPE_REMINDER}
set theResult to current application's NSMutableArray's array()
repeat with theCalendar in theCalendars
  set theColor to missing value
  set theNSColor to theCalendar's |color|()
  if theNSColor is not missing value then
    set theRGB to (theNSColor's colorUsingColorSpace:(current application's NSColorSpace's sRGBColorSpace()))
    if theRGB is not missing value then set theColor to {theRGB's redComponent(), theRGB's greenComponent(), theRGB's blueComponent()}
  end if
  (theResult's addObject:(current application's NSDictionary's dictionaryWithObjects:{(theCalendar's calendarIdentifier()) as text, (theCalendar's title()) as text, my nullable(theColor)} forKeys:{"id", "title", "color"}))
end repeat
set theDefaultId to missing value
set theDefault to theStore's defaultCalendarForNewReminders()
if theDefault is not missing value then set theDefaultId to (theDefault's calendarIdentifier()) as text
return my toJSON(current application's NSDictionary's dictionaryWithObjects:{theResult, my nullable(theDefaultId)} forKeys:{"calendars", "defaultCalendarId"})`);
}

export function buildFetchScript(calendarIds?: string[]): string {
  const scope = calendarIds ? `{${calendarIds.map(quote).join(', ')}}` : 'missing value';

  return script(`
set theStore to my openStore()
set theFlagged to my flaggedIds()
set theScope to ${scope}
tell application "Reminders" to set theAppIds to id of every reminder
set theResult to current application's NSMutableArray's array()
repeat with theAppId in theAppIds
  set theIdentifier to text ${REMINDER_URL_PREFIX.length + 1} thru -1 of (theAppId as text)
  set theReminder to my findReminder(theStore, theIdentifier)
  if theReminder is not missing value then
    if theScope is missing value or theScope contains ((theReminder's calendar()'s calendarIdentifier()) as text) then
      (theResult's addObject:(my reminderRecord(theReminder, theFlagged)))
    end if
  end if
end repeat
return my toJSON(theResult)`);
}

export function buildGetScript(id: string): string {
  return script(`
set theStore to my openStore()
set theReminder to my findReminder(theStore, ${quote(id)})
if theReminder is missing value then return "null"
return my toJSON(my reminderRecord(theReminder, my flaggedIds()))`);
}

export function buildCreateScript(draft: StoreReminderDraft): string {
  const { calendarId, flagged, ...fields } = draft;
  const setters = buildSetters(fields).join('\n');

  return script(`
set theStore to my openStore()
set theCalendar to theStore's calendarWithIdentifier:${quote(calendarId)}
if theCalendar is missing value then error "Calendar not found: " & ${quote(calendarId)} number -1728
set theReminder to current application's EKReminder's reminderWithEventStore:theStore
theReminder's setCalendar:theCalendar
${setters}
my saveReminder(theStore, theReminder)
set theIdentifier to (theReminder's calendarItemIdentifier()) as text
${flaggedLine(flagged ? true : undefined)}
return my toJSON(my reminderRecord(theReminder, my flaggedIds()))`);
}

export function buildUpdateScript(id: string, changes: StoreReminderChanges): string {
  const { flagged, ...fields } = changes;
  const setters = buildSetters(fields).join('\n');

  return script(`
set theStore to my openStore()
set theReminder to my findReminder(theStore, ${quote(id)})
if theReminder is missing value then return "null"
${setters}
my saveReminder(theStore, theReminder)
set theIdentifier to (theReminder's calendarItemIdentifier()) as text
${flaggedLine(flagged)}
return my toJSON(my reminderRecord(theReminder, my flaggedIds()))`);
}

export function buildRemoveScript(id: string): string {
  return script(`
set theStore to my openStore()
set theReminder to my findReminder(theStore, ${quote(id)})
if theReminder is missing value then return "false"
set {theRemoved, theError} to theStore's removeReminder:theReminder commit:true |error|:(reference)
if not (theRemoved as boolean) then error "Failed to remove reminder: " & ((theError's localizedDescription()) as text)
return "true"`);
}
