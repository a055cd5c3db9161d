export {
  classifySubcategory,
  classifyWithRule,
  subcategoryBreakdown,
  allSubcategoryBreakdowns,
  SUBCATEGORY_RULES,
} from './classifier.js'

export type {
  SubcategoryRule,
  SubcategoryAmount,
  CategorySubcategories,
} from './classifier.js'
