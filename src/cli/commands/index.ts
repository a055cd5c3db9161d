export { analyzeCommand } from './analyze.js'
export { validateCommand } from './validate.js'
export { rollingCommand } from './rolling.js'
export { subcategoriesCommand } from './subcategories.js'
