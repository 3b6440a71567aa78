// Instructions sent to the vision model. The copy is approved by the client,
// so every prompt insists on verbatim text.

export const NOT_IDENTIFIED = 'NOT IDENTIFIED';

export const BRAND_PROMPT = `Analiza este brandboard/manual de marca y extrae la siguiente información en formato JSON:

{
    "color_primario": "#HEXCODE (el color principal de la marca)",
    "color_secundario": "#HEXCODE (el color secundario o de acento, suele ser para botones/CTAs)",
    "color_texto": "descripción del color de texto (ej: 'gris azulado oscuro', '#333333')",
    "color_fondo": "descripción del fondo (ej: 'blanco', 'crema claro', '#FAFAFA')",
    "tipografia": "Nombre EXACTO de la tipografía (debe existir en Google Fonts)",
    "estilo": "palabras clave que describan el estilo (ej: 'wellness, profesional, cercano, limpio')",
    "notas_adicionales": "cualquier otra observación relevante sobre el estilo visual"
}

IMPORTANTE sobre tipografía:
- Busca el nombre exacto de la fuente en el brandboard
- Debe ser una fuente que exista en Google Fonts
- Ejemplos válidos: "Be Vietnam Pro", "Montserrat", "Poppins", "Inter", "Playfair Display"

Si no puedes identificar algo con certeza, indica "${NOT_IDENTIFIED}".
Responde SOLO con el JSON, sin explicaciones adicionales.`;

export const COPY_PROMPT = `Transcribe TODO el texto visible en estas imágenes.

REGLAS CRÍTICAS:
1. Transcribe PALABRA POR PALABRA, exactamente como aparece
2. NO resumas, NO parafrasees, NO "mejores" el texto
3. Mantén saltos de línea donde los veas
4. Si hay secciones claras, sepáralas con una línea en blanco
5. Incluye TODO: títulos, subtítulos, bullets, botones, disclaimers

El copy de marketing está aprobado por el cliente y NO puede modificarse "ni una coma".

Responde SOLO con el texto transcrito, sin comentarios tuyos.`;

const SECTION_TEMPLATE = `### SECCIÓN 1: HERO (centrado)
[Título principal]
[Subtítulo]
[Texto descriptivo]
Formulario:
- Campo: Nombre
- Campo: Email
- Checkbox: [texto del checkbox si existe]
- Botón: [texto del botón]

### SECCIÓN 2: URGENCIA (centrado)
[Fecha del evento]
[Contador regresivo]
[Texto de urgencia]

### SECCIÓN 3: LEAD MAGNET (centrado)
[Mockup regalo: descripción]
[Descripción del regalo/bonus]

### SECCIÓN 4: PAIN POINTS (centrado)
Título: [Esto es para ti si... o similar]
- [punto 1]
- [punto 2]
- [etc.]

### SECCIÓN 5: BENEFICIOS + BIO (2 columnas en paralelo)
COLUMNA IZQUIERDA:
Título: [Lo que vas a aprender/descubrir]
- [beneficio 1]
- [beneficio 2]
- [etc.]

COLUMNA DERECHA:
[PLACEHOLDER: FOTO DEL EXPERTO]
Nombre: [nombre]
Título: [credenciales]
Bio: [texto completo de la bio]

### SECCIÓN 6: TESTIMONIOS (centrado o grid de 3 columnas)
[Testimonio 1]
[Testimonio 2]
[etc.]

### SECCIÓN 7: CTA FINAL (centrado)
[Título de cierre]
[Fecha recordatorio]
[Botón: texto del botón]`;

export function sectionsPrompt(rawCopy: string): string {
  return `Organiza el siguiente copy de landing page en secciones numeradas para Lovable.

COPY EXTRAÍDO:
${rawCopy}

FORMATO DE SALIDA - Usa EXACTAMENTE este formato con secciones numeradas:

${SECTION_TEMPLATE}

REGLAS CRÍTICAS:
1. Copia el texto EXACTAMENTE como está - PALABRA POR PALABRA
2. NO resumas, NO parafrasees, NO "mejores" el texto
3. Si una sección no existe en el copy, OMÍTELA (no la incluyas)
4. Indica fotos con [PLACEHOLDER: descripción]
5. NO inventes contenido que no esté en el copy original
6. Para secciones de 2 columnas, especifica claramente qué va en cada columna`;
}
