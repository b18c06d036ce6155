import type { ConversationMessage, MessageMetadata } from "../../utils/types";
import LEXICON from "../../data/detectionLexicon.json";
import { countMarkerHits } from "../markers";

export type ContextAnalysis = {
  expectedCommunicationScore: number;
  channelScore: number;
  overall: number;
};

/**
 * `history` holds the turns before `message`; an empty scammer side means the
 * message is unsolicited first contact.
 */
export function analyzeContext(
  message: string,
  metadata: MessageMetadata = {},
  history: ConversationMessage[] = []
): ContextAnalysis {
  const text = message.toLowerCase();
  const { sensitiveRequests, messagingChannels } = LEXICON.context;
  const asksSensitive = countMarkerHits(text, sensitiveRequests) > 0;
  const firstContact = !history.some((m) => m.sender === "scammer");

  let expectedCommunicationScore = 0.2;
  if (firstContact) expectedCommunicationScore = asksSensitive ? 0.8 : 0.5;

  const channel = (metadata.channel || "").toLowerCase();
  const channelScore = asksSensitive && messagingChannels.includes(channel) ? 0.8 : 0.2;

  return {
    expectedCommunicationScore,
    channelScore,
    overall: (expectedCommunicationScore + channelScore) / 2
  };
}
