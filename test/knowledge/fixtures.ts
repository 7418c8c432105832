import type { KnowledgeEntry } from "@/lib/knowledge/types";

export const VOCABULARY = ["food", "ecosystem", "water", "rain", "energy", "sun", "fraction"];

export const TEST_CATALOG: KnowledgeEntry[] = [
  { grade: 5, subject: "Science", chapterNumber: 1, chapterName: "Food Webs", content: "food chains and food webs in an ecosystem" },
  { grade: 5, subject: "Science", chapterNumber: 2, chapterName: "Water Cycle", content: "evaporation and rain in the water cycle" },
  { grade: 5, subject: "Science", chapterNumber: 3, chapterName: "Sunlight", content: "energy from the sun" },
  { grade: 5, subject: "Math", chapterNumber: 1, chapterName: "Fractions", content: "adding fraction parts" },
  { grade: 6, subject: "Science", chapterNumber: 1, chapterName: "Rainfall", content: "rain and water in climates" },
  { grade: 1, subject: "Math", chapterNumber: 1, chapterName: "Counting", content: "count to ten" },
  { grade: 1, subject: "Math", chapterNumber: 2, chapterName: "Shapes", content: "circles and squares" },
  { grade: 1, subject: "Math", chapterNumber: 3, chapterName: "Adding", content: "adding small numbers" },
];
