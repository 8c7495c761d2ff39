// backend/src/ai/prompts/routingPrompts.ts

export const INTENT_PROMPT = `You classify messages sent to a study assistant. Messages arrive in English or Arabic.

Pick exactly one intent:
- "action": the user is driving the interface (open, close, next, previous, add a note, bookmark, where am I).
  Arabic command verbs: افتح (open), اقفل (close), زود / اضف (add), علم (mark), وريني (show), التالي / بعد (next), السابق / قبل (previous), انا فين (where am I).
- "query": the user wants content: a quiz, a summary, an explanation, a definition.
  Examples: اختبرني / test me, لخص / summarize, اشرح / explain, يعني ايه / what is.

A message that starts with an action verb is an action even when it names a subject ("افتح الفيزياء" opens the physics document).

Reply with JSON only:
{"intent_type": "action" | "query", "intent_confidence": number between 0 and 1, "intent_details": "short reason"}`;

export const ACTION_ROUTER_PROMPT = `You map interface commands to an action type and extract its arguments. Commands arrive in English or Arabic.

Action types:
- open_doc: open a document or book ("open my notes file", "افتح الكتاب", "افتح الفيزياء")
- open_chat / close_chat: open or close the chat panel ("افتح شات", "اقفل الشات")
- close_doc: close the document ("اقفل المستند")
- add_note: add a note ("add note ...", "زود نوتة ...", "اضف ملاحظة ...")
- open_note: show saved notes ("افتح الملاحظات")
- bookmark: bookmark the current page ("علم", "مارك")
- show_bookmarks: list bookmarks ("وريني العلامات")
- next_section / prev_section: page forward or back ("التالي", "بعد" / "السابق", "قبل")
- location: report the current position ("انا فين", "موقعي ايه")
- unknown: nothing above fits

For add_note:
- note_text is the note body: text in parentheses or quotes, otherwise the words after the command. Never include the page reference in it.
- page_num is set when the user says "page X", "p X", "صفحة X" or "ص X". Arabic-Indic digits become integers.
- With no note body, answer unknown.

Reply with JSON only:
{"action_type": "...", "action_confidence": number between 0 and 1, "action_details": "short reason",
 "arguments": {"doc_id": string | null, "page_num": integer | null, "note_text": string | null}}`;

export const QUERY_ROUTER_PROMPT = `You route content requests to one handler. Requests arrive in English or Arabic.

Routes:
- "qa": quizzing or testing the user ("test me", "quiz me", "اختبرني", "اسألني أسئلة")
- "summarization": summaries and key points ("summarize", "main points", "لخص", "النقاط الرئيسية"); tolerate typos such as "summrize"
- "agents": explanations and discussion ("explain", "what is", "I don't understand", "اشرح", "يعني ايه", "مش فاهم")

When unsure, use "agents".

Reply with JSON only:
{"route": "qa" | "summarization" | "agents", "route_confidence": number between 0 and 1, "route_details": "short reason"}`;
