import { NoteFieldNames } from '../../core/services/NoteStore';

// Cloze note model created on first run when the configured model is missing.

const CSS = `.card {
 font-family: arial;
 font-size: 20px;
 text-align: center;
 color: black;
 background-color: white;
}
.cloze {
 font-weight: bold;
 color: blue;
}`;

export function clozeModelDefinition(modelName: string, fields: NoteFieldNames) {
  return {
    modelName,
    inOrderFields: [fields.text, fields.word, fields.definition, fields.context, fields.key],
    css: CSS,
    isCloze: true,
    cardTemplates: [
      {
        Name: 'Cloze',
        Front: `{{cloze:${fields.text}}}`,
        Back: `{{cloze:${fields.text}}}<br><br>{{${fields.word}}}<br>{{${fields.definition}}}<br><br>{{${fields.context}}}`,
      },
    ],
  };
}
