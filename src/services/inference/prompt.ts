import { CATEGORIES, PAYMENT_METHODS } from "../../types";

export function buildExtractionPrompt(message: string): string {
  return `Eres un asistente que extrae información financiera de mensajes en español.

Analiza el siguiente mensaje y responde con un objeto JSON:

Mensaje: "${message.replace(/"/g, "'")}"

Campos:
- amount: monto numérico, sin símbolos ni separadores
- description: QUÉ se compró o pagó (producto o servicio), nunca el método de pago
- category: una de ${CATEGORIES.join(", ")}
- payment_method: una de ${PAYMENT_METHODS.join(", ")} (tarjeta=card, efectivo=cash, transferencia=transfer, débito=debit); suele ir al final del mensaje
- location: lugar si se menciona, si no null
- date_offset: días respecto a hoy (0=hoy, -1=ayer, 1=mañana)
- confidence: confianza entre 0.0 y 1.0

Formatos de dinero: "50k" = 50000, "50mil" = 50000, "50000" = 50000, "50.5k" = 50500

Ejemplos:
- "30k en Uber transferencia" → description "Uber", category "transport", payment_method "transfer"
- "50k almuerzo tarjeta" → description "almuerzo", category "food", payment_method "card"

Responde ÚNICAMENTE con el JSON, sin explicaciones:

{
  "amount": 50000,
  "description": "almuerzo",
  "category": "food",
  "payment_method": "card",
  "location": null,
  "date_offset": 0,
  "confidence": 0.95
}`;
}
