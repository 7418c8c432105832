export const TIMEOUT_APOLOGY = "I'm sorry, the request timed out. Please try again.";

export const GENERATION_APOLOGY = "I encountered an error while processing your request. Please try again.";

export const INTERNAL_ERROR_MESSAGE = "Something went wrong on our side. Please try again later.";

export const NO_GROUNDING_MARKER = "No specific knowledge found in the knowledge base.";

export const NO_HISTORY_MARKER = "No previous conversation.";
