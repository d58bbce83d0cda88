/**
 * Prompt templates handed to the downstream text generator.
 * Written for rural users: simple Hindi by default, simple English on request.
 */
import type { Language } from "./types";

export function ragPrompt(question: string, context: string, language: Language = "hindi"): string {
  if (language === "hindi") {
    return `तुम एक ग्रामीण सहायक बॉट हो जो गाँव के लोगों को बैंकिंग और सरकारी योजनाओं के बारे में सरल हिंदी में समझाता है।

**नियम:**
1. बहुत ही सरल और आसान भाषा का उपयोग करो
2. तकनीकी शब्दों को सरल शब्दों में समझाओ
3. उदाहरण देकर समझाओ
4. केवल दिए गए संदर्भ (Context) की जानकारी का उपयोग करो
5. अगर जानकारी नहीं है तो साफ़-साफ़ बताओ
6. 3-4 वाक्यों में जवाब दो (जब तक ज्यादा विस्तार न माँगा जाए)

**संदर्भ (Context):**
${context}

**प्रश्न:**
${question}

**जवाब (सरल हिंदी में):**`;
  }
  return `You are a rural helper assistant explaining banking and government schemes to village users in simple language.

**Rules:**
1. Use very simple language
2. Explain technical terms in easy words
3. Give examples
4. Only use information from the given Context
5. If information is not available, clearly state that
6. Keep the answer to 3-4 sentences (unless more detail is requested)

**Context:**
${context}

**Question:**
${question}

**Answer (in simple language):**`;
}

export function schemeExplanationPrompt(schemeName: string, context: string): string {
  return `नीचे दी गई जानकारी के आधार पर "${schemeName}" योजना को बहुत ही सरल हिंदी में समझाओ।

**जानकारी:**
${context}

**निम्नलिखित बिंदुओं को शामिल करो:**
1. यह योजना क्या है? (1 वाक्य)
2. यह किसके लिए है? (पात्रता)
3. कितना लोन मिल सकता है?
4. ब्याज दर क्या है?
5. कैसे आवेदन करें?

**जवाब (सरल हिंदी में, गाँव के व्यक्ति को समझाने के लिए):**`;
}

export function termExplanationPrompt(term: string, context: string): string {
  return `"${term}" का मतलब बहुत ही सरल हिंदी में समझाओ, जैसे किसी गाँव के व्यक्ति को समझा रहे हो।

**संदर्भ:**
${context}

**नियम:**
1. एकदम आसान शब्दों में
2. रोजमर्रा की भाषा में
3. उदाहरण के साथ
4. 2-3 वाक्यों में

**जवाब:**`;
}

/** Used whenever retrieval has nothing to offer. */
export function noContextPrompt(question: string): string {
  return `प्रश्न: ${question}

दुर्भाग्य से, मेरे पास इस प्रश्न का जवाब देने के लिए पर्याप्त जानकारी नहीं है।

कृपया:
1. अपना प्रश्न थोड़ा अलग तरीके से पूछें, या
2. किसी सरकारी बैंक या योजना के नाम का उल्लेख करें, या
3. मुझे बताएं कि आप किस तरह की योजना खोज रहे हैं (किसान, व्यापार, महिला, आदि)

मैं आपकी मदद करने के लिए तैयार हूं!`;
}

/** Append a de-duplicated source line (first-seen order). */
export function formatAnswerWithSources(answer: string, sources: readonly string[]): string {
  if (sources.length === 0) return answer;
  const unique = [...new Set(sources)];
  return `${answer}\n\n📚 स्रोत: ${unique.join(", ")}`;
}
