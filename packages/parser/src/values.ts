import { AttributeValue } from './ast';

/** Flattens a parsed value to the text stored on a resource node. */
export function attributeText(value: AttributeValue): string {
  switch (value.type) {
    case 'Reference': {
      return value.value.join('.');
    }
    case 'Number':
    case 'Boolean': {
      return String(value.value);
    }
    default: {
      return value.value;
    }
  }
}
